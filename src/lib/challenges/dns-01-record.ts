import { createHash } from 'node:crypto';

export interface Dns01Record {
  /** Fully qualified record name, with trailing dot */
  fqdn: string;
  /** base64url(SHA-256(keyAuth)) */
  value: string;
}

/** TXT record to publish for `domain` (wildcard prefix dropped). */
export function dns01Record(domain: string, keyAuth: string): Dns01Record {
  const base = domain.replace(/^\*\./, '').replace(/\.$/, '');
  return {
    fqdn: `_acme-challenge.${base}.`,
    value: createHash('sha256').update(keyAuth).digest('base64url'),
  };
}
