import { loadConfig } from './config';
import { errorMessage } from './errors';
import { LibraryOrchestrator } from './orchestrator';
import { configureTelemetry } from './telemetry';

async function main() {
  const config = loadConfig(process.argv[2]);
  configureTelemetry({ logDir: config.logDir });
  const orchestrator = LibraryOrchestrator.fromConfig(config);
  const snapshot = await orchestrator.refresh();
  const result = await orchestrator.buildIndex();
  console.log(
    result.rebuilt
      ? `Indexed ${result.paragraphs} paragraphs from ${result.books} of ${snapshot.books.size} books.`
      : `Index is up to date (${snapshot.books.size} books).`,
  );
}

main().catch(err => {
  console.error(errorMessage(err));
  process.exit(1);
});
