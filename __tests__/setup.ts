import { beforeAll } from '@jest/globals';
import '../src/lib/crypto/x509-provider.js';

beforeAll(() => {
  process.env.NODE_ENV = 'test';
});
