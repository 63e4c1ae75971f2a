// ============================================================
// Error taxonomy
// ============================================================

export const ERROR_CODES = [
  'DOC_CREATE_ERROR',
  'DOC_LOAD_ERROR',
  'DOC_SAVE_ERROR',
  'DOC_PROTECT_ERROR',
  'DOC_REPLACE_ERROR',
  'DOC_MERGE_ERROR',
  'DOC_WATERMARK_ERROR',
  'TABLE_CREATE_ERROR',
  'TABLE_ADD_ERROR',
  'TABLE_DELETE_ERROR',
  'TABLE_INFO_ERROR',
  'TABLE_CELL_ERROR',
  'PARAGRAPH_TEXT_ERROR',
  'PARAGRAPH_DELETE_ERROR',
  'PARAGRAPH_INFO_ERROR',
  'PARAGRAPH_ADD_ERROR',
  'PARAGRAPH_UPDATE_ERROR',
  'CONVERSION_ERROR',
  'CONVERSION_STATUS_ERROR',
  'CONVERSION_HISTORY_ERROR',
  'FORMAT_ERROR',
  'FORMAT_INFO_ERROR',
  'UNKNOWN_OPERATION',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/** Why a call failed. The code says which operation family; the kind says why. */
export type FaultKind =
  | 'INVALID_PATH'
  | 'DOCUMENT_NOT_FOUND'
  | 'INDEX_OUT_OF_RANGE'
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'UNKNOWN_OPERATION'
  | 'ENGINE_ERROR';

const SUGGESTIONS: Record<ErrorCode, string> = {
  DOC_CREATE_ERROR: 'Please check if the document name is valid and you have write permissions.',
  DOC_LOAD_ERROR: 'Please check if the document exists and is a valid Word document.',
  DOC_SAVE_ERROR: 'Please check if the documents directory is writable.',
  DOC_PROTECT_ERROR: 'Please check if the protection level is valid and you have the necessary permissions.',
  DOC_REPLACE_ERROR: 'Please check if the document exists and the search parameters are valid.',
  DOC_MERGE_ERROR: 'Please check if both documents exist and are accessible.',
  DOC_WATERMARK_ERROR: 'Please check if the document exists and the watermark parameters are valid.',
  TABLE_CREATE_ERROR: 'Please check if the table dimensions and section/paragraph indices are valid.',
  TABLE_ADD_ERROR: 'Please check if the table dimensions and section/paragraph indices are valid.',
  TABLE_DELETE_ERROR: 'Please check if the table index and section index are valid.',
  TABLE_INFO_ERROR: 'Please check if the table index and section index are valid.',
  TABLE_CELL_ERROR: 'Please check if the table index, row, column, and section index are valid.',
  PARAGRAPH_TEXT_ERROR: 'Please check if the paragraph index and section index are valid.',
  PARAGRAPH_DELETE_ERROR: 'Please check if the paragraph index and section index are valid.',
  PARAGRAPH_INFO_ERROR: 'Please check if the paragraph index and section index are valid.',
  PARAGRAPH_ADD_ERROR: 'Please check if the section index and paragraph index are valid.',
  PARAGRAPH_UPDATE_ERROR: 'Please check if the paragraph index and section index are valid.',
  CONVERSION_ERROR: 'Please check if the document exists and the target format is supported.',
  CONVERSION_STATUS_ERROR: 'Please check if the document name is valid.',
  CONVERSION_HISTORY_ERROR: 'Please check if the document name is valid.',
  FORMAT_ERROR: 'Please check if the paragraph index is valid and the formatting parameters are correct.',
  FORMAT_INFO_ERROR: 'Please check if the paragraph index is valid.',
  UNKNOWN_OPERATION: 'Call tools/list to see the available tool names.',
};

export function suggestionFor(code: ErrorCode): string {
  return SUGGESTIONS[code];
}

/**
 * A classified failure raised anywhere below the tool boundary.
 * The tool boundary attaches the family code; everything else only knows the kind.
 */
export class DocumentFault extends Error {
  readonly kind: FaultKind;

  constructor(kind: FaultKind, message: string) {
    super(message);
    this.name = 'DocumentFault';
    this.kind = kind;
  }
}

export function invalidPath(message: string): DocumentFault {
  return new DocumentFault('INVALID_PATH', message);
}

export function documentNotFound(name: string): DocumentFault {
  return new DocumentFault('DOCUMENT_NOT_FOUND', `Document file not found: ${name}`);
}

export function indexOutOfRange(what: string, index: number, count: number, scope: string): DocumentFault {
  return new DocumentFault(
    'INDEX_OUT_OF_RANGE',
    `${what} index ${index} out of range (${scope} has ${count} ${what.toLowerCase()}${count === 1 ? '' : 's'})`
  );
}

export function validationError(message: string): DocumentFault {
  return new DocumentFault('VALIDATION_ERROR', message);
}

export function unsupportedFormat(format: string, supported: readonly string[]): DocumentFault {
  return new DocumentFault('UNSUPPORTED_FORMAT', `Unsupported format: ${format}. Supported formats: ${supported.join(', ')}`);
}

/** Anything that is not already a fault is an engine failure. */
export function toFault(err: unknown): DocumentFault {
  if (err instanceof DocumentFault) return err;
  if (err instanceof Error) return new DocumentFault('ENGINE_ERROR', err.message);
  return new DocumentFault('ENGINE_ERROR', String(err));
}
