/**
 * Extension → file category lookup. Drives the upload allow-list,
 * the content type sent to the bucket and the icon shown next to an attachment.
 */

export const FileCategory = {
  Document: 'document',
  Image: 'image',
  Archive: 'archive',
  Spreadsheet: 'spreadsheet',
  Video: 'video',
  Audio: 'audio',
} as const;

export type FileCategory = (typeof FileCategory)[keyof typeof FileCategory];

export interface FileTypeInfo {
  readonly category: FileCategory;
  readonly mimeType: string;
}

export const FILE_TYPES: Readonly<Record<string, FileTypeInfo>> = {
  pdf: { category: FileCategory.Document, mimeType: 'application/pdf' },
  doc: { category: FileCategory.Document, mimeType: 'application/msword' },
  docx: { category: FileCategory.Document, mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document' },
  txt: { category: FileCategory.Document, mimeType: 'text/plain' },
  md: { category: FileCategory.Document, mimeType: 'text/markdown' },
  jpg: { category: FileCategory.Image, mimeType: 'image/jpeg' },
  jpeg: { category: FileCategory.Image, mimeType: 'image/jpeg' },
  png: { category: FileCategory.Image, mimeType: 'image/png' },
  gif: { category: FileCategory.Image, mimeType: 'image/gif' },
  svg: { category: FileCategory.Image, mimeType: 'image/svg+xml' },
  zip: { category: FileCategory.Archive, mimeType: 'application/zip' },
  rar: { category: FileCategory.Archive, mimeType: 'application/vnd.rar' },
  '7z': { category: FileCategory.Archive, mimeType: 'application/x-7z-compressed' },
  csv: { category: FileCategory.Spreadsheet, mimeType: 'text/csv' },
  xlsx: { category: FileCategory.Spreadsheet, mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet' },
  xls: { category: FileCategory.Spreadsheet, mimeType: 'application/vnd.ms-excel' },
  mp4: { category: FileCategory.Video, mimeType: 'video/mp4' },
  mov: { category: FileCategory.Video, mimeType: 'video/quicktime' },
  avi: { category: FileCategory.Video, mimeType: 'video/x-msvideo' },
  mp3: { category: FileCategory.Audio, mimeType: 'audio/mpeg' },
  wav: { category: FileCategory.Audio, mimeType: 'audio/wav' },
};

export const ALLOWED_EXTENSIONS: readonly string[] = Object.keys(FILE_TYPES);

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const CATEGORY_ICONS: Record<FileCategory, string> = {
  [FileCategory.Document]: '📝',
  [FileCategory.Image]: '🖼️',
  [FileCategory.Archive]: '📦',
  [FileCategory.Spreadsheet]: '📊',
  [FileCategory.Video]: '🎥',
  [FileCategory.Audio]: '🎵',
};

const PDF_ICON = '📄';
const DEFAULT_ICON = '📎';

/** Text after the last dot, lower-cased; '' when there is none */
export function getFileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : '';
}

export function getFileType(fileName: string): FileTypeInfo | null {
  const ext = getFileExtension(fileName);
  return Object.hasOwn(FILE_TYPES, ext) ? FILE_TYPES[ext] ?? null : null;
}

export function getFileCategory(fileName: string): FileCategory | null {
  return getFileType(fileName)?.category ?? null;
}

export function guessMimeType(fileName: string): string {
  return getFileType(fileName)?.mimeType ?? DEFAULT_MIME_TYPE;
}

export function getFileIcon(fileName: string): string {
  if (getFileExtension(fileName) === 'pdf') return PDF_ICON;
  const category = getFileCategory(fileName);
  return category ? CATEGORY_ICONS[category] : DEFAULT_ICON;
}
