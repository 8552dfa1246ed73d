import { ALLOWED_EXTENSIONS, FILE_TYPES, getFileExtension } from './file-types.js';

export const MAX_FILE_SIZE_MB = 10;
export const MAX_FILE_SIZE_BYTES = MAX_FILE_SIZE_MB * 1024 * 1024;

export type FileValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

function toMb(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(1);
}

/**
 * Pre-upload checks, in order: size limit, presence of an extension, allow-listed extension.
 * Reports the first failure; never throws.
 */
export function validateFileUpload(
  sizeBytes: number,
  fileName: string,
  maxBytes: number = MAX_FILE_SIZE_BYTES,
): FileValidation {
  if (sizeBytes > maxBytes) {
    return { valid: false, reason: `File size (${toMb(sizeBytes)} MB) exceeds maximum (${toMb(maxBytes)} MB)` };
  }

  const ext = getFileExtension(fileName);
  if (!ext) {
    return { valid: false, reason: 'File must have an extension' };
  }

  if (!Object.hasOwn(FILE_TYPES, ext)) {
    return {
      valid: false,
      reason: `File type '.${ext}' is not allowed. Allowed types: ${ALLOWED_EXTENSIONS.join(', ')}`,
    };
  }

  return { valid: true };
}
