import type { ReactElement } from 'react';
import { renderToBuffer } from '@react-pdf/renderer';

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new Uint8Array(bytes.length);
  copy.set(bytes);
  return copy.buffer;
}

export async function renderPdfToBuffer(doc: ReactElement): Promise<ArrayBuffer> {
  const output = await renderToBuffer(doc);
  return toArrayBuffer(output);
}
