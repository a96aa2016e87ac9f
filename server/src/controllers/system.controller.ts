import type { Request, Response } from "express";

export interface ToolEntry {
  id: string;
  name: string;
  method: "POST";
  path: string;
  fields: string[];
}

const TOOLS: ToolEntry[] = [
  { id: "merge", name: "Merge PDFs", method: "POST", path: "/api/pdf/merge", fields: ["files"] },
  { id: "split", name: "Split PDF", method: "POST", path: "/api/pdf/split", fields: ["file", "ranges"] },
  { id: "compress", name: "Compress PDF", method: "POST", path: "/api/pdf/compress", fields: ["file"] },
  { id: "rotate", name: "Rotate PDF", method: "POST", path: "/api/pdf/rotate", fields: ["file", "angle", "pages"] },
  {
    id: "encrypt",
    name: "Password protect PDF",
    method: "POST",
    path: "/api/pdf/encrypt",
    fields: ["file", "password", "owner_password"],
  },
  { id: "decrypt", name: "Remove PDF password", method: "POST", path: "/api/pdf/decrypt", fields: ["file", "password"] },
  { id: "info", name: "PDF page info", method: "POST", path: "/api/pdf/info", fields: ["file"] },
  { id: "convert", name: "Convert files", method: "POST", path: "/api/convert", fields: ["file", "conversion_type"] },
];

const SHARE_TOOLS: ToolEntry[] = [
  {
    id: "share-file",
    name: "Share a file",
    method: "POST",
    path: "/api/share/upload",
    fields: ["file", "password", "expires_hours", "max_downloads", "title", "description"],
  },
  {
    id: "share-text",
    name: "Share text",
    method: "POST",
    path: "/api/share/text",
    fields: ["text", "password", "expires_hours", "max_downloads", "title", "description"],
  },
];

export function healthCheck(_req: Request, res: Response): void {
  res
    .status(200)
    .json({ status: "healthy", timestamp: new Date().toISOString() });
}

/** Catalogue of the tools this server exposes. */
export function catalogue(sharingEnabled: boolean) {
  const tools = sharingEnabled ? [...TOOLS, ...SHARE_TOOLS] : TOOLS;
  return (_req: Request, res: Response): void => {
    res.status(200).json({ name: "PDF Toolkit", tools });
  };
}
