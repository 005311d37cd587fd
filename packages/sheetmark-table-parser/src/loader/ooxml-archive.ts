import * as path from 'path';
import AdmZip from 'adm-zip';
import { DOMParser } from '@xmldom/xmldom';
import type { PackageArchive } from '../models/document.model';

/**
 * Zip-backed view of an OOXML package. Reads are lazy; the archive keeps
 * the bytes it was opened from.
 */
export class OoxmlArchive implements PackageArchive {
  private readonly zip: AdmZip;
  private readonly names: string[];

  private constructor(zip: AdmZip) {
    this.zip = zip;
    this.names = zip.getEntries().filter((e) => !e.isDirectory).map((e) => e.entryName);
  }

  /** Throws when the bytes are not a readable zip */
  static open(bytes: Buffer): OoxmlArchive {
    return new OoxmlArchive(new AdmZip(bytes));
  }

  entries(): string[] {
    return [...this.names];
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  readText(name: string): string | undefined {
    const entry = this.zip.getEntry(name);
    return entry ? entry.getData().toString('utf8') : undefined;
  }

  /** Parsed XML part, or undefined when the part is missing */
  readXml(name: string): Document | undefined {
    return readXmlPart(this, name);
  }
}

export function readXmlPart(archive: PackageArchive, name: string): Document | undefined {
  const text = archive.readText(name);
  return text === undefined ? undefined : parseXml(text);
}

export function parseXml(text: string): Document {
  return new DOMParser().parseFromString(text, 'text/xml');
}

/** Descendants with the given qualified tag name, in document order */
export function elementsByTag(parent: Document | Element, tag: string): Element[] {
  const list = parent.getElementsByTagName(tag);
  const result: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const item = list.item(i);
    if (item) result.push(item);
  }
  return result;
}

export function firstByTag(parent: Document | Element, tag: string): Element | undefined {
  return elementsByTag(parent, tag)[0];
}

export function textOf(node: Element | undefined): string {
  return node?.textContent ?? '';
}

/** Archive entries matching `pattern`, sorted by their numeric suffix */
export function partsMatching(archive: PackageArchive, pattern: RegExp): string[] {
  const numberOf = (name: string) => Number(/(\d+)\.\w+$/.exec(name)?.[1] ?? 0);
  return archive.entries().filter((name) => pattern.test(name)).sort((a, b) => numberOf(a) - numberOf(b));
}

/** Relationship id -> package part name, resolved against `baseDir` */
export function readRelationshipTargets(archive: PackageArchive, relsPart: string, baseDir: string): Map<string, string> {
  const targets = new Map<string, string>();
  const rels = readXmlPart(archive, relsPart);
  if (!rels) return targets;

  for (const rel of elementsByTag(rels, 'Relationship')) {
    const id = rel.getAttribute('Id');
    const target = rel.getAttribute('Target');
    if (!id || !target) continue;
    const resolved = target.startsWith('/')
      ? target.slice(1)
      : path.posix.normalize(path.posix.join(baseDir, target));
    targets.set(id, resolved);
  }
  return targets;
}
