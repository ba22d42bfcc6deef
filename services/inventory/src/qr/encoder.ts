import { toBuffer } from 'qrcode';

export interface QrEncoder {
  /** Renders `data` as a PNG and returns it base64-encoded. */
  encode(data: string): Promise<string>;
}

// Fixed render parameters keep output byte-identical for the same input
const QR_OPTIONS = {
  type: 'png',
  errorCorrectionLevel: 'L',
  scale: 10,
  margin: 4,
  color: { dark: '#000000ff', light: '#ffffffff' },
} as const;

export class PngQrEncoder implements QrEncoder {
  async encode(data: string): Promise<string> {
    if (data === '') throw new TypeError('cannot encode an empty string');
    const png = await toBuffer(data, QR_OPTIONS);
    return png.toString('base64');
  }
}

export const pngQrEncoder = new PngQrEncoder();
