export {
  FileCategory,
  FILE_TYPES,
  ALLOWED_EXTENSIONS,
  DEFAULT_MIME_TYPE,
  getFileExtension,
  getFileType,
  getFileCategory,
  guessMimeType,
  getFileIcon,
} from './file-types.js';
export type { FileTypeInfo } from './file-types.js';
export { MAX_FILE_SIZE_MB, MAX_FILE_SIZE_BYTES, validateFileUpload } from './file-validation.js';
export type { FileValidation } from './file-validation.js';
export { sanitizeFileName, formatPathTimestamp, buildStoragePath } from './storage-path.js';
export type { StorageBucket, StoredObject } from './storage-bucket.js';
export { LocalBucket } from './local-bucket.js';
export type { LocalBucketOptions } from './local-bucket.js';
