import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadEnvFiles } from './env';

describe('loadEnvFiles', () => {
    const keys = ['CBE_TEST_SYMBOL', 'CBE_TEST_PORT'];

    afterEach(() => {
        keys.forEach((key) => delete process.env[key]);
    });

    it('loads .env and lets .env.local override it', () => {
        const root = mkdtempSync(path.join(tmpdir(), 'cbe-env-'));
        writeFileSync(path.join(root, '.env'), 'CBE_TEST_SYMBOL=BTCUSDT\nCBE_TEST_PORT=5001\n');
        writeFileSync(path.join(root, '.env.local'), 'CBE_TEST_PORT=6001\n');

        loadEnvFiles(root);

        expect(process.env.CBE_TEST_SYMBOL).toBe('BTCUSDT');
        expect(process.env.CBE_TEST_PORT).toBe('6001');
    });

    it('ignores a root without env files', () => {
        const root = mkdtempSync(path.join(tmpdir(), 'cbe-env-'));

        loadEnvFiles(root);

        expect(process.env.CBE_TEST_SYMBOL).toBeUndefined();
    });
});
