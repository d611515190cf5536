import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

process.env.CMDWISE_CONFIG_DIR = mkdtempSync(join(tmpdir(), 'cmdwise-jest-'));
