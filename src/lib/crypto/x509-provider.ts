import { cryptoProvider } from '@peculiar/x509';

// @peculiar/x509 parses and verifies through WebCrypto
cryptoProvider.set(globalThis.crypto);
