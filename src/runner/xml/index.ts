/* src/runner/xml/index.ts
 * Thin helpers over xml2js' default object shape:
 *  - child elements grouped by tag name into arrays,
 *  - attributes under "$", text under "_",
 *  - a childless, attribute-less element collapses to its text (a string).
 */
import { readFile } from 'node:fs/promises';

import { parseStringPromise } from 'xml2js';

import { ExitCode, FatalError, messageOf } from '../errors';

export type XmlNode = Record<string, unknown>;

export const isXmlNode = (v: unknown): v is XmlNode =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/** Raised when a document is not well-formed. */
export class XmlSyntaxError extends FatalError {
  readonly file: string;

  constructor(file: string, detail: string) {
    super(
      `XML syntax error in ${file}: ${detail.split('\n').join(' ').trim()}`,
      ExitCode.InvalidInput,
    );
    this.name = 'XmlSyntaxError';
    this.file = file;
  }
}

export type XmlDocument = {
  /** Tag name of the root element. */
  rootName: string;
  /** Root element; text-only roots are normalized to \{ _: text \}. */
  root: XmlNode;
};

const asNode = (v: unknown): XmlNode | undefined => {
  if (isXmlNode(v)) return v;
  if (typeof v === 'string') return { _: v };
  return undefined;
};

const INTERNAL_SUBSET = /<!DOCTYPE[^[>]*\[([\s\S]*?)\]\s*>/;
const ENTITY_DECL =
  /<!ENTITY\s+([A-Za-z_][\w.-]*)\s+(?:"([^"]*)"|'([^']*)')\s*>/g;
const ENTITY_REF = /&([A-Za-z_][\w.-]*);/g;
const PREDEFINED = new Set(['amp', 'lt', 'gt', 'quot', 'apos']);
const MAX_EXPANSION_DEPTH = 8;

/**
 * Replace references to general entities declared in the DOCTYPE internal
 * subset, which the parser would otherwise reject. The first declaration of
 * a name wins; undeclared references are left for the parser.
 */
export const expandDeclaredEntities = (text: string): string => {
  const subset = INTERNAL_SUBSET.exec(text);
  const decls = subset?.[1];
  if (!subset || decls === undefined) return text;
  const entities = new Map<string, string>();
  for (const [, name = '', dq, sq] of decls.matchAll(ENTITY_DECL)) {
    if (PREDEFINED.has(name) || entities.has(name)) continue;
    entities.set(name, dq ?? sq ?? '');
  }
  if (entities.size === 0) return text;

  const end = subset.index + subset[0].length;
  let body = text.slice(end);
  for (let depth = 0; depth < MAX_EXPANSION_DEPTH; depth += 1) {
    const next = body.replace(
      ENTITY_REF,
      (ref, name: string) => entities.get(name) ?? ref,
    );
    if (next === body) break;
    body = next;
  }
  return text.slice(0, end) + body;
};

/** Parse XML text; throws XmlSyntaxError labelled with `file`. */
export const parseXml = async (
  text: string,
  file: string,
): Promise<XmlDocument> => {
  let doc: unknown;
  try {
    doc = await parseStringPromise(expandDeclaredEntities(text));
  } catch (e) {
    throw new XmlSyntaxError(file, messageOf(e));
  }
  if (!isXmlNode(doc)) throw new XmlSyntaxError(file, 'document is empty');
  const [rootName] = Object.keys(doc);
  const root = rootName === undefined ? undefined : asNode(doc[rootName]);
  if (rootName === undefined || !root) {
    throw new XmlSyntaxError(file, 'document has no root element');
  }
  return { rootName, root };
};

/** Read and parse an XML file. A missing file is fatal. */
export const readXmlFile = async (file: string): Promise<XmlDocument> => {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (e) {
    throw new FatalError(`unable to read ${file}: ${messageOf(e)}`);
  }
  return parseXml(text, file);
};

/** Child elements named `name`, normalized to nodes. */
export const childElements = (node: XmlNode, name: string): XmlNode[] => {
  const list = node[name];
  if (!Array.isArray(list)) return [];
  const out: XmlNode[] = [];
  for (const item of list) {
    const n = asNode(item);
    if (n) out.push(n);
  }
  return out;
};

/** First child element named `name`. */
export const firstChild = (node: XmlNode, name: string): XmlNode | undefined =>
  childElements(node, name)[0];

/** Attribute value, when present. */
export const attrOf = (node: XmlNode, name: string): string | undefined => {
  const attrs = node.$;
  if (!isXmlNode(attrs)) return undefined;
  const v = attrs[name];
  return typeof v === 'string' ? v : undefined;
};

/** Trimmed text content of the first `name` child; undefined when absent or blank. */
export const childText = (node: XmlNode, name: string): string | undefined => {
  const child = firstChild(node, name);
  const text = child?._;
  if (typeof text !== 'string') return undefined;
  const t = text.trim();
  return t.length ? t : undefined;
};

/** Element tag names of a node (attributes and text keys excluded). */
export const childNames = (node: XmlNode): string[] =>
  Object.keys(node).filter((k) => k !== '$' && k !== '_');
