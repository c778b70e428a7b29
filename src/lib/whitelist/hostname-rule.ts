/** Predicate over a requested hostname, owned by exactly one shared secret. */
export interface HostnameRule {
  readonly kind: string;
  matches(hostname: string): boolean;
}

/** Case-sensitive exact string equality. */
export class ExactHostnameRule implements HostnameRule {
  readonly kind = 'exact';

  constructor(readonly hostname: string) {}

  matches(hostname: string): boolean {
    return hostname === this.hostname;
  }
}
