/* src/runner/build/source.ts
 * Load the source and every XInclude'd file, failing on the first document
 * that is not well-formed, and count elements that need generated assets.
 */
import path from 'node:path';

import { log } from '../util/log';
import {
  attrOf,
  childNames,
  isXmlNode,
  readXmlFile,
  type XmlNode,
} from '../xml';

export type SourceDocument = {
  file: string;
  rootName: string;
  root: XmlNode;
};

const XINCLUDE_NS = 'http://www.w3.org/2001/XInclude';

/** Namespace prefix ('' for the default) to URI. */
type NamespaceScope = ReadonlyMap<string, string>;

const scopeOf = (node: XmlNode, parent: NamespaceScope): NamespaceScope => {
  const attrs = node.$;
  if (!isXmlNode(attrs)) return parent;
  let scope: Map<string, string> | undefined;
  for (const [key, value] of Object.entries(attrs)) {
    if (typeof value !== 'string') continue;
    let prefix: string;
    if (key === 'xmlns') prefix = '';
    else if (key.startsWith('xmlns:')) prefix = key.slice('xmlns:'.length);
    else continue;
    scope ??= new Map(parent);
    scope.set(prefix, value);
  }
  return scope ?? parent;
};

// An undeclared xi: prefix still counts, as it always has.
const isInclude = (name: string, scope: NamespaceScope): boolean => {
  const colon = name.indexOf(':');
  const prefix = colon < 0 ? '' : name.slice(0, colon);
  if (name.slice(colon + 1) !== 'include') return false;
  const uri = scope.get(prefix);
  return uri === XINCLUDE_NS || (uri === undefined && prefix === 'xi');
};

const includesOf = (root: XmlNode, file: string): string[] => {
  const out: string[] = [];
  const walk = (n: XmlNode, scope: NamespaceScope): void => {
    for (const name of childNames(n)) {
      const list = n[name];
      if (!Array.isArray(list)) continue;
      for (const item of list) {
        if (!isXmlNode(item)) continue;
        const inner = scopeOf(item, scope);
        if (isInclude(name, inner)) {
          const href = attrOf(item, 'href');
          // parse="text" pulls raw text; nothing to check.
          if (href && attrOf(item, 'parse') !== 'text')
            out.push(path.resolve(path.dirname(file), href));
        } else {
          walk(item, inner);
        }
      }
    }
  };
  walk(root, scopeOf(root, new Map()));
  return out;
};

/**
 * Parse `entry` and, recursively, every XInclude'd XML file.
 * Throws XmlSyntaxError for the first malformed document.
 */
export const loadSourceTree = async (
  entry: string,
): Promise<SourceDocument[]> => {
  const docs: SourceDocument[] = [];
  const seen = new Set<string>();
  const visit = async (file: string): Promise<void> => {
    if (seen.has(file)) return;
    seen.add(file);
    const doc = await readXmlFile(file);
    docs.push({ file, ...doc });
    for (const inc of includesOf(doc.root, file)) await visit(inc);
  };
  await visit(path.resolve(entry));
  log.debug(`source is well-formed (${String(docs.length)} file(s))`);
  return docs;
};

export type GeneratedElementCounts = {
  'latex-image': number;
  asymptote: number;
  sageplot: number;
  /** video elements with a @youtube attribute */
  youtube: number;
  /** interactive elements without a @preview attribute */
  interactiveWithoutPreview: number;
};

/** Count elements whose output depends on generated assets. */
export const countGeneratedElements = (
  docs: readonly SourceDocument[],
): GeneratedElementCounts => {
  const counts: GeneratedElementCounts = {
    'latex-image': 0,
    asymptote: 0,
    sageplot: 0,
    youtube: 0,
    interactiveWithoutPreview: 0,
  };
  const visit = (name: string, item: unknown): void => {
    const node = isXmlNode(item) ? item : undefined;
    switch (name) {
      case 'latex-image':
      case 'asymptote':
      case 'sageplot':
        counts[name] += 1;
        break;
      case 'video':
        if (node && attrOf(node, 'youtube') !== undefined) counts.youtube += 1;
        break;
      case 'interactive':
        if (!node || attrOf(node, 'preview') === undefined)
          counts.interactiveWithoutPreview += 1;
        break;
      default:
        break;
    }
    if (node) walk(node);
  };
  const walk = (n: XmlNode): void => {
    for (const name of childNames(n)) {
      const list = n[name];
      if (!Array.isArray(list)) continue;
      for (const item of list) visit(name, item);
    }
  };
  for (const d of docs) visit(d.rootName, d.root);
  return counts;
};
