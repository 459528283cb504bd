import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createInitCommand, initWorkspace } from '../init.js';
import type { CommandContext } from '../../types.js';
import { getConfigValue } from '../../../config/loader.js';
import { SAMPLE_DOCUMENT } from '../../../indexer/loader.js';

describe('init command', () => {
  let tempDir: string;
  let previousHome: string | undefined;

  beforeEach(() => {
    chalk.level = 0;
    previousHome = process.env['DOCQA_HOME'];
    tempDir = mkdtempSync(join(tmpdir(), 'docqa-init-'));
    process.env['DOCQA_HOME'] = join(tempDir, 'home');
  });

  afterEach(() => {
    if (previousHome === undefined) {
      delete process.env['DOCQA_HOME'];
    } else {
      process.env['DOCQA_HOME'] = previousHome;
    }
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('initWorkspace', () => {
    it('writes the config, the sample document and the chosen directory', () => {
      const docs = join(tempDir, 'docs');

      const result = initWorkspace(docs);

      expect(result).toEqual({
        configPath: join(tempDir, 'home', 'config.toml'),
        configCreated: true,
        directory: docs,
        samplePath: join(docs, 'sample.txt'),
      });
      expect(readFileSync(join(docs, 'sample.txt'), 'utf-8')).toBe(SAMPLE_DOCUMENT);
      expect(getConfigValue('documents.directory')).toBe(docs);
    });

    it('keeps existing files on a second run', () => {
      const docs = join(tempDir, 'docs');
      initWorkspace(docs);

      const result = initWorkspace(docs);

      expect(result.configCreated).toBe(false);
      expect(result.samplePath).toBeNull();
    });
  });

  it('prints what it created', async () => {
    const logOutput: string[] = [];
    const ctx: CommandContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const docs = join(tempDir, 'docs');

    await createInitCommand(() => ctx).parseAsync([docs], { from: 'user' });

    expect(existsSync(join(docs, 'sample.txt'))).toBe(true);
    expect(logOutput).toEqual([
      `✓ Created ${join(tempDir, 'home', 'config.toml')}`,
      `✓ Wrote ${join(docs, 'sample.txt')}`,
      '',
      'Try: docqa ask "What is AWS Bedrock?"',
    ]);
  });
});
