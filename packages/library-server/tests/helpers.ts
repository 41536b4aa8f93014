import fs from 'fs';
import os from 'os';
import path from 'path';
import AdmZip from 'adm-zip';
import type { BookMetadata, BookRecord, TocEntry } from '@libris/shared';
import type { ContentExtractor } from '../src/epub';

export function makeTempDir(prefix = 'libris-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(file: string, content = 'placeholder') {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

export function toc(...labels: string[]): TocEntry[] {
  return labels.map((label, i) => ({ label, anchorId: `ch${i + 1}.xhtml`, depth: 0 }));
}

export function record(title: string, fields: Partial<Omit<BookRecord, 'title'>> = {}): BookRecord {
  return {
    title,
    author: fields.author,
    published: fields.published,
    path: fields.path ?? `/library/${title.toLowerCase().replace(/\s+/g, '-')}.epub`,
    toc: fields.toc ?? [],
    text: fields.text ?? '',
  };
}

export function bookMap(...records: BookRecord[]): Map<string, BookRecord> {
  return new Map(records.map(r => [r.title, r]));
}

export interface FakeBook {
  title?: string;
  author?: string;
  published?: string;
  toc?: TocEntry[];
  body?: string;
  unreadable?: boolean;
}

/** Extractor keyed by file name that records every call it receives. */
export class FakeExtractor implements ContentExtractor {
  readonly metadataCalls: string[] = [];
  readonly bodyCalls: string[] = [];

  constructor(private readonly books: Record<string, FakeBook> = {}) {}

  set(fileName: string, book: FakeBook) {
    this.books[fileName] = book;
  }

  extractMetadata(filePath: string): BookMetadata | null {
    this.metadataCalls.push(filePath);
    const book = this.books[path.basename(filePath)] ?? {};
    if (book.unreadable) return null;
    return {
      title: book.title ?? path.parse(filePath).name,
      author: book.author,
      published: book.published,
      path: filePath,
      toc: book.toc ?? [],
    };
  }

  extractBody(filePath: string): string {
    this.bodyCalls.push(filePath);
    return this.books[path.basename(filePath)]?.body ?? '';
  }
}

export interface EpubFixture {
  title?: string;
  creator?: string;
  date?: string;
  /** Spine documents in reading order, as XHTML bodies. */
  chapters: Array<{ id: string; label: string; body: string }>;
  /** Emit an EPUB 3 nav document instead of an NCX. */
  nav?: boolean;
}

function xhtml(title: string, body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml"><head><title>${title}</title></head><body>${body}</body></html>`;
}

export function writeEpub(file: string, fixture: EpubFixture): string {
  const zip = new AdmZip();
  zip.addFile('mimetype', Buffer.from('application/epub+zip'));
  zip.addFile(
    'META-INF/container.xml',
    Buffer.from(`<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>
</container>`),
  );
  const meta = [
    fixture.title ? `<dc:title>${fixture.title}</dc:title>` : '',
    fixture.creator ? `<dc:creator>${fixture.creator}</dc:creator>` : '',
    fixture.date ? `<dc:date>${fixture.date}</dc:date>` : '',
  ].join('');
  const items = fixture.chapters
    .map(c => `<item id="${c.id}" href="text/${c.id}.xhtml" media-type="application/xhtml+xml"/>`)
    .join('');
  const tocItem = fixture.nav
    ? '<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>'
    : '<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>';
  const spine = fixture.chapters.map(c => `<itemref idref="${c.id}"/>`).join('');
  zip.addFile(
    'OEBPS/content.opf',
    Buffer.from(`<?xml version="1.0"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">${meta}</metadata>
  <manifest>${tocItem}${items}</manifest>
  <spine${fixture.nav ? '' : ' toc="ncx"'}>${spine}</spine>
</package>`),
  );
  if (fixture.nav) {
    const lis = fixture.chapters.map(c => `<li><a href="text/${c.id}.xhtml">${c.label}</a></li>`).join('');
    zip.addFile('OEBPS/nav.xhtml', Buffer.from(xhtml('Contents', `<nav type="toc"><ol>${lis}</ol></nav>`)));
  } else {
    const points = fixture.chapters
      .map(c => `<navPoint id="np-${c.id}"><navLabel><text>${c.label}</text></navLabel><content src="text/${c.id}.xhtml"/></navPoint>`)
      .join('');
    zip.addFile(
      'OEBPS/toc.ncx',
      Buffer.from(`<?xml version="1.0"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1"><navMap>${points}</navMap></ncx>`),
    );
  }
  for (const c of fixture.chapters) {
    zip.addFile(`OEBPS/text/${c.id}.xhtml`, Buffer.from(xhtml(c.label, c.body)));
  }
  fs.mkdirSync(path.dirname(file), { recursive: true });
  zip.writeZip(file);
  return file;
}
