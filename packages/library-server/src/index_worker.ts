import { parentPort, workerData } from 'worker_threads';
import { isIndexBuildRequest, writeIndexFile } from './index_writer';

// Thread entry for index builds; spawned by search_index.ts.
const port = parentPort;
if (!port) throw new Error('index_worker must run in a worker thread');

const request: unknown = workerData;
if (!isIndexBuildRequest(request)) throw new Error('index worker received a malformed build request');

port.postMessage(writeIndexFile(request.dbPath, request.documents));
