import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { XMLParser } from 'fast-xml-parser';
import JSZip from 'jszip';

import { describeError, ValidationError } from './errors';
import type { DocumentSource, SourceDocument } from './types';

const DOCUMENT_PART = 'word/document.xml';
const DOCX_EXTENSION = '.docx';
// Word keeps a hidden owner file next to every open document.
const LOCK_FILE_PREFIX = '~$';

type OrderedNode = Record<string, unknown>;

const isNode = (value: unknown): value is OrderedNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const tagOf = (node: OrderedNode): string | undefined => Object.keys(node).find((key) => key !== ':@');

const childrenOf = (node: OrderedNode, tag: string): OrderedNode[] => {
  const value = node[tag];
  return Array.isArray(value) ? value.filter(isNode) : [];
};

const findChild = (nodes: OrderedNode[], tag: string): OrderedNode | undefined =>
  nodes.find((node) => tagOf(node) === tag);

const textOf = (node: OrderedNode): string => {
  const value = node['#text'];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
};

const runText = (nodes: OrderedNode[]): string =>
  nodes
    .map((node) => {
      const tag = tagOf(node);
      switch (tag) {
        case undefined:
        case 'pPr':
        case 'rPr':
          return '';
        case 't':
          return childrenOf(node, tag).map(textOf).join('');
        case 'tab':
          return '\t';
        case 'br':
        case 'cr':
          return '\n';
        default:
          return runText(childrenOf(node, tag));
      }
    })
    .join('');

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  removeNSPrefix: true,
  trimValues: false,
  parseTagValue: false
});

/** Body paragraphs only, joined with single spaces. Table cells and headers are not read. */
export const parseDocumentXml = (xml: string): string => {
  const parsed: unknown = parser.parse(xml);
  const roots = Array.isArray(parsed) ? parsed.filter(isNode) : [];
  const document = findChild(roots, 'document');
  const body = document ? findChild(childrenOf(document, 'document'), 'body') : undefined;
  if (!body) {
    throw new ValidationError('Word document has no body element.');
  }
  return childrenOf(body, 'body')
    .filter((node) => tagOf(node) === 'p')
    .map((paragraph) => runText(childrenOf(paragraph, 'p')))
    .join(' ');
};

export const readDocxText = async (data: Buffer | Uint8Array): Promise<string> => {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new ValidationError(`Not a Word document: ${describeError(error)}`);
  }
  const part = zip.file(DOCUMENT_PART);
  if (!part) {
    throw new ValidationError(`Word document is missing ${DOCUMENT_PART}.`);
  }
  return parseDocumentXml(await part.async('string'));
};

export class DocxFolderSource implements DocumentSource {
  constructor(private readonly folder: string) {}

  async list(): Promise<string[]> {
    const names = await readdir(this.folder);
    return names.filter(
      (name) => extname(name).toLowerCase() === DOCX_EXTENSION && !name.startsWith(LOCK_FILE_PREFIX)
    );
  }

  async read(name: string): Promise<SourceDocument> {
    const data = await readFile(join(this.folder, name));
    try {
      return { name, text: await readDocxText(data) };
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(`${name}: ${error.message}`);
      }
      throw error;
    }
  }
}
