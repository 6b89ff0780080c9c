/**
 * Export File Loader
 *
 * Reads the key-value export tree. Each `*.json` file holds either one
 * document (an object) or an array of documents.
 *
 * Layout:
 *   export/
 *     account/             one directory per source collection
 *       a1.json
 *     project__template_0000000001/
 *       t1.json
 *     user.json            root-level files are collections too
 */
import fs from 'fs';
import path from 'path';
import { ExportUnavailableError, InvalidDocumentFormatError } from './errors';
import type { DocumentRef, JsonValue, SourceDocument } from './types';

export interface ExportEntry {
  /** Directory name, or file name for root-level files */
  name: string;
  /** Name used for table resolution: the directory name or the file stem */
  stem: string;
  kind: 'directory' | 'file';
  path: string;
}

const DOCUMENT_EXT = '.json';

function isDocumentFile(name: string): boolean {
  return path.extname(name).toLowerCase() === DOCUMENT_EXT;
}

/** Code-unit order, independent of the host locale */
function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** List the collections under the export root, sorted by name */
export function discoverExportEntries(exportDir: string): ExportEntry[] {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(exportDir);
  } catch {
    throw new ExportUnavailableError(exportDir);
  }
  if (!stat.isDirectory()) throw new ExportUnavailableError(exportDir);

  const entries: ExportEntry[] = [];
  for (const dirent of fs.readdirSync(exportDir, { withFileTypes: true })) {
    const fullPath = path.join(exportDir, dirent.name);
    if (dirent.isDirectory()) {
      entries.push({ name: dirent.name, stem: dirent.name, kind: 'directory', path: fullPath });
    } else if (dirent.isFile() && isDocumentFile(dirent.name)) {
      const stem = path.basename(dirent.name, path.extname(dirent.name));
      entries.push({ name: dirent.name, stem, kind: 'file', path: fullPath });
    }
  }

  return entries.sort(byName);
}

/** Document files of one collection directory, sorted by file name */
export function listDocumentFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && isDocumentFile(d.name))
    .sort(byName)
    .map((d) => path.join(dir, d.name));
}

/**
 * Detect file encoding by inspecting the BOM.
 * FF FE = UTF-16LE, anything else is read as UTF-8.
 */
export function detectEncoding(buf: Uint8Array): BufferEncoding {
  if (buf[0] === 0xff && buf[1] === 0xfe) return 'utf16le';
  return 'utf-8';
}

function stripBOM(str: string): string {
  return str.replace(/^\uFEFF/, '');
}

function isDocument(value: JsonValue): value is SourceDocument {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Parse file content into documents; throws InvalidDocumentFormatError */
export function parseDocuments(filePath: string, content: string): DocumentRef[] {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(stripBOM(content));
  } catch (e) {
    throw new InvalidDocumentFormatError(filePath, e instanceof Error ? e.message : String(e));
  }

  if (isDocument(parsed)) {
    return [{ filePath, index: 0, document: parsed }];
  }

  if (Array.isArray(parsed)) {
    return parsed.map((item, index) => {
      if (!isDocument(item)) {
        throw new InvalidDocumentFormatError(filePath, `element ${index} is not an object`);
      }
      return { filePath, index, document: item };
    });
  }

  throw new InvalidDocumentFormatError(filePath, 'expected an object or an array of objects');
}

/** Read and parse one export file */
export function readDocuments(filePath: string): DocumentRef[] {
  let buf: Buffer;
  try {
    buf = fs.readFileSync(filePath);
  } catch (e) {
    throw new InvalidDocumentFormatError(filePath, e instanceof Error ? e.message : String(e));
  }
  return parseDocuments(filePath, buf.toString(detectEncoding(buf)));
}
