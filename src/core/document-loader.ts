/**
 * Document Loader
 *
 * Wraps a byte buffer into a parsed pdf-lib document. Validates structure by
 * parsing rather than trusting a filename or MIME type, and reports failures
 * as DocumentLoadError with a reason of not-a-pdf, encrypted or corrupt.
 */

import { PDFDict, PDFDocument, PDFName, type PDFPage } from 'pdf-lib';
import { DocumentLoadError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.loader;

const PDF_HEADER = '%PDF-';

/** PDF readers tolerate junk before the header within the first kilobyte */
const HEADER_SEARCH_WINDOW = 1024;

/** US Letter, used when a page has no readable MediaBox */
const FALLBACK_PAGE_SIZE = { width: 612, height: 792 };

/**
 * Parsed document handle. Lives for a single analysis.
 */
export interface LoadedDocument {
  /** The input, as given; page content is read from it separately */
  readonly bytes: Uint8Array;
  readonly pdf: PDFDocument;
  readonly pages: readonly PDFPage[];
  readonly pageCount: number;
  readonly pageSizes: ReadonlyArray<{ width: number; height: number }>;
  /** Catalog's AcroForm dictionary, when present */
  readonly acroForm?: PDFDict;
  readonly title?: string;
  readonly author?: string;
}

type HeaderState = 'present' | 'truncated' | 'absent';

function inspectHeader(bytes: Uint8Array): HeaderState {
  const window = Buffer.from(
    bytes.buffer,
    bytes.byteOffset,
    Math.min(bytes.byteLength, HEADER_SEARCH_WINDOW)
  ).toString('latin1');

  if (window.includes(PDF_HEADER)) return 'present';

  const start = window.trimStart();
  if (start.length > 0 && start.length < PDF_HEADER.length && PDF_HEADER.startsWith(start)) {
    return 'truncated';
  }
  if (start.startsWith('%PD')) return 'truncated';
  return 'absent';
}

function readOptionalString(read: () => string | undefined): string | undefined {
  try {
    const value = read();
    return value && value.trim() ? value.trim() : undefined;
  } catch (error) {
    log.debug('Ignoring unreadable document metadata', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function readPageSize(page: PDFPage, pageIndex: number): { width: number; height: number } {
  try {
    return page.getSize();
  } catch (error) {
    log.debug('Page has no readable MediaBox; assuming US Letter', {
      pageIndex,
      error: error instanceof Error ? error.message : String(error),
    });
    return FALLBACK_PAGE_SIZE;
  }
}

/**
 * Parse PDF bytes. The buffer is only read, never modified.
 *
 * @throws DocumentLoadError
 */
export async function loadDocument(bytes: Uint8Array): Promise<LoadedDocument> {
  if (bytes.byteLength === 0) {
    throw new DocumentLoadError('not-a-pdf', 'Input is empty');
  }

  const header = inspectHeader(bytes);
  if (header === 'absent') {
    throw new DocumentLoadError('not-a-pdf', 'No PDF header found');
  }
  if (header === 'truncated') {
    throw new DocumentLoadError('corrupt', 'PDF header is truncated');
  }

  let pdf: PDFDocument;
  try {
    pdf = await PDFDocument.load(bytes, {
      ignoreEncryption: true,
      updateMetadata: false,
      throwOnInvalidObject: false,
    });
  } catch (error) {
    throw new DocumentLoadError(
      'corrupt',
      `Failed to parse PDF: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (pdf.isEncrypted) {
    throw new DocumentLoadError('encrypted', 'PDF is encrypted');
  }

  const catalog = pdf.context.lookup(pdf.context.trailerInfo.Root);
  if (!(catalog instanceof PDFDict)) {
    throw new DocumentLoadError('corrupt', 'PDF has no document catalog');
  }

  let pages: PDFPage[];
  try {
    pages = pdf.getPages();
  } catch (error) {
    throw new DocumentLoadError(
      'corrupt',
      `Failed to read page tree: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const acroForm = catalog.lookup(PDFName.of('AcroForm'));

  const document: LoadedDocument = {
    bytes,
    pdf,
    pages,
    pageCount: pages.length,
    pageSizes: pages.map((page, index) => readPageSize(page, index)),
    acroForm: acroForm instanceof PDFDict ? acroForm : undefined,
    title: readOptionalString(() => pdf.getTitle()),
    author: readOptionalString(() => pdf.getAuthor()),
  };

  log.debug('Loaded document', {
    pageCount: document.pageCount,
    hasAcroForm: document.acroForm !== undefined,
  });

  return document;
}
