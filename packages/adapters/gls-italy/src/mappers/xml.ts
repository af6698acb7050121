/**
 * XML plumbing for the label service
 *
 * The service is an ASMX web service: answers arrive wrapped in a
 * <string> element whose text is itself the XML document.
 * Keys of parsed documents are lowercased so lookups ignore the
 * inconsistent casing of the service.
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { isRecord } from '@spedisci/core';

export type XmlNode = string | XmlElement | XmlNode[];
export interface XmlElement {
  [key: string]: XmlNode;
}

const REPEATED_ELEMENTS = new Set(['parcel', 'spedizione']);

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName: string) => REPEATED_ELEMENTS.has(tagName.toLowerCase()),
});

const builder = new XMLBuilder({
  ignoreAttributes: true,
  suppressEmptyNode: true,
});

export function buildXml(document: Record<string, unknown>): string {
  return String(builder.build(document));
}

function toNode(value: unknown): XmlNode {
  if (Array.isArray(value)) return value.map(toNode);
  if (isRecord(value)) {
    const element: XmlElement = {};
    for (const [key, child] of Object.entries(value)) {
      element[key.toLowerCase()] = toNode(child);
    }
    return element;
  }
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Parse an answer body into a lowercased node tree.
 * Returns the trimmed text itself when the body is not XML.
 */
export function parseServiceXml(body: unknown): XmlNode {
  const text = typeof body === 'string' ? body.trim() : '';
  if (!text.startsWith('<')) return text;

  const node = toNode(parser.parse(text));
  if (isElement(node) && typeof node.string === 'string') {
    return parseServiceXml(node.string);
  }
  return node;
}

export function isElement(node: XmlNode | undefined): node is XmlElement {
  return node !== undefined && typeof node !== 'string' && !Array.isArray(node);
}

/**
 * Every element named `name` at any depth, in document order
 */
export function findElements(node: XmlNode, name: string): XmlElement[] {
  if (typeof node === 'string') return [];
  if (Array.isArray(node)) return node.flatMap((child) => findElements(child, name));

  const found: XmlElement[] = [];
  for (const [key, child] of Object.entries(node)) {
    if (key === name) {
      for (const item of Array.isArray(child) ? child : [child]) {
        if (isElement(item)) found.push(item);
      }
    } else {
      found.push(...findElements(child, name));
    }
  }
  return found;
}

/**
 * Text of the first element named after one of `names`, searched depth first
 */
export function findText(node: XmlNode, names: readonly string[]): string | undefined {
  if (typeof node === 'string') return undefined;
  if (Array.isArray(node)) {
    for (const child of node) {
      const text = findText(child, names);
      if (text !== undefined) return text;
    }
    return undefined;
  }
  for (const name of names) {
    const value = node[name];
    if (typeof value === 'string' && value !== '') return value;
  }
  for (const child of Object.values(node)) {
    const text = findText(child, names);
    if (text !== undefined) return text;
  }
  return undefined;
}

/**
 * All text of a node joined by spaces
 */
export function textContent(node: XmlNode): string {
  if (typeof node === 'string') return node;
  const parts = Array.isArray(node) ? node.map(textContent) : Object.values(node).map(textContent);
  return parts.filter((part) => part !== '').join(' ');
}

/**
 * Direct string children of an element, e.g. the fields of one <Spedizione>
 */
export function leafFields(element: XmlElement): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(element)) {
    if (typeof value === 'string') fields[key] = value;
  }
  return fields;
}

/**
 * First non-empty field among aliases
 */
export function pick(fields: Record<string, string>, aliases: readonly string[]): string | undefined {
  for (const alias of aliases) {
    const value = fields[alias];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}
