import path from 'path';
import AdmZip from 'adm-zip';
import { XMLParser } from 'fast-xml-parser';
import { Parser } from 'htmlparser2';
import type { BookMetadata, TocEntry } from '@libris/shared';

/**
 * Turns a book file into metadata and plain text. Implementations must not
 * throw on malformed input: they return `null` / `''` instead.
 */
export interface ContentExtractor {
  extractMetadata(filePath: string): BookMetadata | null;
  extractBody(filePath: string): string;
}

const ARRAY_TAGS = new Set(['rootfile', 'item', 'itemref', 'navPoint', 'title', 'creator', 'date', 'nav', 'li']);

const xml = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: name => ARRAY_TAGS.has(name),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function children(node: unknown, key: string): unknown[] {
  const value = child(node, key);
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function attr(node: unknown, name: string): string | undefined {
  const value = child(node, `@_${name}`);
  return typeof value === 'string' ? value : undefined;
}

function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node.trim() || undefined;
  if (typeof node === 'number') return String(node);
  if (isNode(node)) {
    const own = textOf(node['#text']);
    if (own) return own;
    // mixed content such as <a><span>Chapter</span> 1</a>
    const parts = Object.entries(node)
      .filter(([k]) => !k.startsWith('@_'))
      .map(([, v]) => (Array.isArray(v) ? v.map(textOf).filter(Boolean).join(' ') : textOf(v)))
      .filter(Boolean);
    return parts.length ? parts.join(' ') : undefined;
  }
  if (Array.isArray(node)) return textOf(node[0]);
  return undefined;
}

function firstText(node: unknown, key: string): string | undefined {
  for (const value of children(node, key)) {
    const text = textOf(value);
    if (text) return text;
  }
  return undefined;
}

function resolveHref(baseDir: string, href: string): string {
  const withoutFragment = href.split('#')[0];
  let decoded = withoutFragment;
  try {
    decoded = decodeURIComponent(withoutFragment);
  } catch {
    decoded = withoutFragment;
  }
  return path.posix.normalize(path.posix.join(baseDir, decoded));
}

const SKIP_TAGS = new Set(['script', 'style', 'head']);
const BLOCK_TAGS = new Set(['p', 'div', 'br', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'li', 'blockquote', 'tr']);

/**
 * Converts XHTML markup to plain text. Block-level elements end with a blank
 * line so paragraphs survive as blank-line separated units.
 */
export function htmlToText(html: string): string {
  const out: string[] = [];
  let skipDepth = 0;
  const parser = new Parser(
    {
      onopentag(name) {
        if (SKIP_TAGS.has(name)) skipDepth++;
      },
      ontext(text) {
        if (!skipDepth) out.push(text);
      },
      onclosetag(name) {
        if (SKIP_TAGS.has(name)) {
          skipDepth = Math.max(0, skipDepth - 1);
          return;
        }
        if (!skipDepth && BLOCK_TAGS.has(name)) out.push('\n\n');
      },
    },
    { decodeEntities: true },
  );
  parser.write(html);
  parser.end();
  return out.join('');
}

interface ManifestItem {
  id: string;
  href: string;
  mediaType?: string;
  properties?: string;
}

interface Package {
  zip: AdmZip;
  opf: unknown;
  manifest: Map<string, ManifestItem>;
}

export class EpubExtractor implements ContentExtractor {
  private open(filePath: string): Package {
    const zip = new AdmZip(filePath);
    const container: unknown = xml.parse(this.readEntry(zip, 'META-INF/container.xml'));
    const rootfile = children(child(child(container, 'container'), 'rootfiles'), 'rootfile')[0];
    const opfPath = attr(rootfile, 'full-path');
    if (!opfPath) throw new Error('container.xml has no rootfile');
    const opf: unknown = xml.parse(this.readEntry(zip, opfPath));
    const opfDir = path.posix.dirname(opfPath) === '.' ? '' : path.posix.dirname(opfPath);
    const manifest = new Map<string, ManifestItem>();
    for (const item of children(child(child(opf, 'package'), 'manifest'), 'item')) {
      const id = attr(item, 'id');
      const href = attr(item, 'href');
      if (!id || !href) continue;
      manifest.set(id, { id, href: resolveHref(opfDir, href), mediaType: attr(item, 'media-type'), properties: attr(item, 'properties') });
    }
    return { zip, opf, manifest };
  }

  private readEntry(zip: AdmZip, name: string): string {
    const entry = zip.getEntry(name);
    if (!entry) throw new Error(`missing entry ${name}`);
    return entry.getData().toString('utf8');
  }

  private ncxToc(pkg: Package): TocEntry[] {
    const spine = child(child(pkg.opf, 'package'), 'spine');
    const tocId = attr(spine, 'toc');
    const declared = tocId ? pkg.manifest.get(tocId) : undefined;
    const ncxItem = declared ?? [...pkg.manifest.values()].find(i => i.mediaType === 'application/x-dtbncx+xml');
    if (!ncxItem) return [];
    const ncx: unknown = xml.parse(this.readEntry(pkg.zip, ncxItem.href));
    const toc: TocEntry[] = [];
    const visit = (points: unknown[], depth: number) => {
      for (const point of points) {
        const label = textOf(child(child(point, 'navLabel'), 'text'));
        const src = attr(child(point, 'content'), 'src') ?? '';
        if (label) toc.push({ label, anchorId: src, depth });
        visit(children(point, 'navPoint'), depth + 1);
      }
    };
    visit(children(child(child(ncx, 'ncx'), 'navMap'), 'navPoint'), 0);
    return toc;
  }

  private navToc(pkg: Package): TocEntry[] {
    const navItem = [...pkg.manifest.values()].find(i => (i.properties ?? '').split(/\s+/).includes('nav'));
    if (!navItem) return [];
    const doc: unknown = xml.parse(this.readEntry(pkg.zip, navItem.href));
    const navs = children(child(child(doc, 'html'), 'body'), 'nav');
    const nav = navs.find(n => attr(n, 'type') === 'toc') ?? navs[0];
    const toc: TocEntry[] = [];
    const visit = (list: unknown, depth: number) => {
      for (const li of children(list, 'li')) {
        const anchor = child(li, 'a') ?? child(li, 'span');
        const label = textOf(anchor);
        if (label) toc.push({ label, anchorId: attr(anchor, 'href') ?? '', depth });
        visit(child(li, 'ol'), depth + 1);
      }
    };
    visit(child(nav, 'ol'), 0);
    return toc;
  }

  extractMetadata(filePath: string): BookMetadata | null {
    let pkg: Package;
    try {
      pkg = this.open(filePath);
    } catch (err) {
      console.error(`[epub] error reading ${path.basename(filePath)}:`, err instanceof Error ? err.message : err);
      return null;
    }
    const metadata = child(child(pkg.opf, 'package'), 'metadata');
    let toc: TocEntry[] = [];
    try {
      toc = this.ncxToc(pkg);
      if (!toc.length) toc = this.navToc(pkg);
    } catch (err) {
      console.warn(`[epub] unreadable table of contents in ${path.basename(filePath)}:`, err instanceof Error ? err.message : err);
    }
    return {
      title: firstText(metadata, 'title') ?? path.parse(filePath).name,
      author: firstText(metadata, 'creator'),
      published: firstText(metadata, 'date'),
      path: filePath,
      toc,
    };
  }

  extractBody(filePath: string): string {
    let pkg: Package;
    try {
      pkg = this.open(filePath);
    } catch (err) {
      console.error(`[epub] error reading ${path.basename(filePath)}:`, err instanceof Error ? err.message : err);
      return '';
    }
    const sections: string[] = [];
    for (const ref of children(child(child(pkg.opf, 'package'), 'spine'), 'itemref')) {
      const idref = attr(ref, 'idref');
      const item = idref ? pkg.manifest.get(idref) : undefined;
      if (!item) continue;
      try {
        sections.push(htmlToText(this.readEntry(pkg.zip, item.href)));
      } catch (err) {
        console.warn(`[epub] skipping section ${item.href} of ${path.basename(filePath)}:`, err instanceof Error ? err.message : err);
      }
    }
    return sections.join('\n');
  }
}
