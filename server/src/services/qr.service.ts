import { toBuffer } from "qrcode";
import type { QRCodeToBufferOptions } from "qrcode";

const QR_OPTIONS: QRCodeToBufferOptions = {
  type: "png",
  errorCorrectionLevel: "L",
  margin: 4,
  scale: 10,
  color: { dark: "#FF7F11", light: "#000000" },
};

/** PNG image encoding `text`. */
export function renderQrPng(text: string): Promise<Buffer> {
  return toBuffer(text, QR_OPTIONS);
}
