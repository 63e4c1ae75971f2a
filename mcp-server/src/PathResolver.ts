import * as fs from 'fs';
import * as path from 'path';
import { documentNotFound, invalidPath, validationError } from './errors';

/** OOXML word-processing packages the engine can open and edit. */
export const DOCUMENT_EXTENSIONS = ['.docx', '.docm', '.dotx', '.dotm'] as const;

/**
 * Maps bare document names onto files directly under one root directory.
 * Names never carry directories, so nothing can escape the root.
 */
export class PathResolver {
  private readonly _root: string;

  constructor(root: string) {
    this._root = path.resolve(root);
  }

  get root(): string { return this._root; }

  /** Absolute path for `name`, creating the root when it is missing. Existence is not checked. */
  resolve(name: string): string {
    checkName(name);
    fs.mkdirSync(this._root, { recursive: true });
    return path.join(this._root, name);
  }

  /** Like {@link resolve}, but the file must already exist. */
  resolveExisting(name: string): string {
    const filePath = this.resolve(name);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw documentNotFound(name);
    }
    return filePath;
  }
}

function checkName(name: string): void {
  if (name.trim() === '') throw invalidPath('Document name cannot be empty');
  if (name.includes('\0')) throw invalidPath('Document name contains a NUL byte');
  if (name.includes('..')) throw invalidPath(`Document name contains a path traversal sequence: ${name}`);
  if (name.includes('/') || name.includes('\\') || path.isAbsolute(name)) {
    throw invalidPath(`Document name must not contain directories: ${name}`);
  }
}

export function hasDocumentExtension(name: string): boolean {
  const ext = path.extname(name).toLowerCase();
  return DOCUMENT_EXTENSIONS.some(allowed => allowed === ext);
}

/** Rejects names the engine cannot open, before any engine call. */
export function requireDocumentName(name: string): void {
  if (!hasDocumentExtension(name)) {
    const ext = path.extname(name);
    throw validationError(
      ext
        ? `Unsupported document format: ${ext}. Expected one of ${DOCUMENT_EXTENSIONS.join(', ')}`
        : `Document name must include an extension (${DOCUMENT_EXTENSIONS.join(', ')}): ${name}`
    );
  }
}
