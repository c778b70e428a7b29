/** A single decoded PEM block. */
export interface PemBlock {
  /** Label between BEGIN and END, e.g. `CERTIFICATE` or `RSA PRIVATE KEY` */
  label: string;
  der: Buffer;
}

const PEM_BLOCK = /-----BEGIN ([A-Z0-9 ]+)-----\r?\n([\s\S]*?)-----END \1-----/g;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode every PEM block of `text` in order. Text outside blocks is ignored;
 * blocks with encapsulated headers (`Proc-Type:`) or a body that is not base64
 * are skipped, like a block that does not decode.
 */
export function decodePemBlocks(text: string): PemBlock[] {
  const blocks: PemBlock[] = [];
  for (const match of text.matchAll(PEM_BLOCK)) {
    const [, label = '', body = ''] = match;
    const compact = body.replace(/\s+/g, '');
    if (compact.length === 0 || !BASE64_BODY.test(compact)) continue;
    blocks.push({ label, der: Buffer.from(compact, 'base64') });
  }
  return blocks;
}

/** First PEM block of `text`, or undefined when there is none. */
export function decodeFirstPemBlock(text: string): PemBlock | undefined {
  return decodePemBlocks(text)[0];
}

/** Encode DER bytes as a PEM block with 64-character lines. */
export function encodePem(label: string, der: Uint8Array): string {
  const body = Buffer.from(der).toString('base64').replace(/.{1,64}/g, '$&\n');
  return `-----BEGIN ${label}-----\n${body}-----END ${label}-----\n`;
}
