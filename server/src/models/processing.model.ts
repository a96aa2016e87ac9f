export const PDF_EXTENSIONS = ["pdf"] as const;

export const SHARE_EXTENSIONS = [
  "pdf",
  "doc",
  "docx",
  "ppt",
  "pptx",
  "txt",
  "csv",
  "png",
  "jpg",
  "jpeg",
] as const;

export const CONTENT_TYPES = {
  pdf: "application/pdf",
  zip: "application/zip",
  txt: "text/plain; charset=utf-8",
  csv: "text/csv; charset=utf-8",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  doc: "application/msword",
  ppt: "application/vnd.ms-powerpoint",
} as const;

export function contentTypeFor(extension: string): string {
  const types: Record<string, string> = CONTENT_TYPES;
  return types[extension] ?? "application/octet-stream";
}

/** A validated upload sitting in the request's temp workspace. */
export interface UploadedFile {
  originalName: string;
  storedName: string;
  path: string;
  size: number;
  extension: string;
  mimeType: string;
}

/** An upload read into memory for a handler. */
export interface InputDocument {
  name: string;
  data: Uint8Array;
}

/** What an operation hands back to the response packager. */
export interface ProcessingResult {
  filename: string;
  contentType: string;
  data: Uint8Array;
  headers?: Record<string, string>;
}

export interface NamedOutput {
  name: string;
  data: Uint8Array;
}

export type RotationAngle = 90 | 180 | 270 | -90;

export interface PageInfo {
  number: number;
  width: number;
  height: number;
  rotation: number;
}

export interface PdfInfo {
  pageCount: number;
  encrypted: boolean;
  pages: PageInfo[];
}
