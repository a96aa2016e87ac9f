/** Row shape of the `shared_files` table. */
export interface ShareRow {
  access_code: string;
  storage_key: string | null;
  original_filename: string;
  file_type: string;
  file_size: number;
  content_type: string;
  title: string | null;
  description: string | null;
  is_text_content: number;
  text_content: string | null;
  password_hash: string | null;
  download_count: number;
  max_downloads: number | null;
  created_at: string;
  expires_at: string;
  last_accessed_at: string | null;
}

export interface ShareRecord {
  accessCode: string;
  storageKey: string | null;
  originalFilename: string;
  fileType: string;
  fileSize: number;
  contentType: string;
  title: string | null;
  description: string | null;
  isText: boolean;
  textContent: string | null;
  passwordHash: string | null;
  downloadCount: number;
  maxDownloads: number | null;
  createdAt: string;
  expiresAt: string;
  lastAccessedAt: string | null;
}

export interface ShareOptions {
  password?: string;
  expiresHours?: number;
  maxDownloads?: number;
  title?: string;
  description?: string;
}

export interface ShareFileInput {
  originalName: string;
  contentType: string;
  data: Buffer;
}

export interface ShareDownload {
  filename: string;
  contentType: string;
  data: Buffer;
}

/** Metadata safe to show to anyone holding the access code. */
export interface PublicShare {
  access_code: string;
  title: string | null;
  description: string | null;
  filename: string;
  file_type: string;
  file_size: number;
  is_text: boolean;
  password_protected: boolean;
  created_at: string;
  expires_at: string;
  download_count: number;
  downloads_remaining: number | null;
}

export function toShareRecord(row: ShareRow): ShareRecord {
  return {
    accessCode: row.access_code,
    storageKey: row.storage_key,
    originalFilename: row.original_filename,
    fileType: row.file_type,
    fileSize: row.file_size,
    contentType: row.content_type,
    title: row.title,
    description: row.description,
    isText: row.is_text_content === 1,
    textContent: row.text_content,
    passwordHash: row.password_hash,
    downloadCount: row.download_count,
    maxDownloads: row.max_downloads,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    lastAccessedAt: row.last_accessed_at,
  };
}

export function toPublicShare(record: ShareRecord): PublicShare {
  return {
    access_code: record.accessCode,
    title: record.title,
    description: record.description,
    filename: record.originalFilename,
    file_type: record.fileType,
    file_size: record.fileSize,
    is_text: record.isText,
    password_protected: record.passwordHash !== null,
    created_at: record.createdAt,
    expires_at: record.expiresAt,
    download_count: record.downloadCount,
    downloads_remaining:
      record.maxDownloads === null
        ? null
        : Math.max(record.maxDownloads - record.downloadCount, 0),
  };
}
