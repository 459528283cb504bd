/**
 * Tests for check command
 *
 * Runs against a temporary DOCQA_HOME and documents directory; AWS and
 * Langfuse variables are set per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runChecks } from '../check.js';
import { _clearEnvCache } from '../../../config/env.js';
import type { BedrockInvokerOptions } from '../../../providers/bedrock.js';
import { FakeInvoker, titanResponder } from '../../../test-utils/index.js';

const ENV_KEYS = [
  'DOCQA_HOME',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'LANGFUSE_PUBLIC_KEY',
  'LANGFUSE_SECRET_KEY',
  'LANGFUSE_BASE_URL',
] as const;

describe('runChecks', () => {
  let tempDir: string;
  let docsDir: string;
  const savedEnv = new Map<string, string | undefined>();

  function writeConfig(extra = ''): void {
    const home = join(tempDir, 'home');
    mkdirSync(home, { recursive: true });
    writeFileSync(
      join(home, 'config.toml'),
      `[documents]\ndirectory = ${JSON.stringify(docsDir)}\n${extra}`,
      'utf-8'
    );
  }

  function setCredentials(): void {
    process.env['AWS_ACCESS_KEY_ID'] = 'test-key-id';
    process.env['AWS_SECRET_ACCESS_KEY'] = 'test-secret';
    _clearEnvCache();
  }

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }

    tempDir = mkdtempSync(join(tmpdir(), 'docqa-check-'));
    docsDir = join(tempDir, 'docs');
    mkdirSync(docsDir);
    writeFileSync(join(docsDir, 'guide.md'), '# Guide\n\nBedrock hosts models.', 'utf-8');

    process.env['DOCQA_HOME'] = join(tempDir, 'home');
    writeConfig();
    _clearEnvCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    _clearEnvCache();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('is ready with credentials and documents', async () => {
    setCredentials();

    const report = await runChecks();

    expect(report.ready).toBe(true);
    expect(report.checks.map((check) => [check.name, check.status])).toEqual([
      ['config', 'ok'],
      ['region', 'ok'],
      ['credentials', 'ok'],
      ['documents', 'ok'],
      ['tracing', 'info'],
    ]);
    expect(report.checks[3]?.message).toBe(`1 document(s) in ${docsDir}`);
  });

  it('warns without credentials while a fallback model is configured', async () => {
    const report = await runChecks();

    const credentials = report.checks.find((check) => check.name === 'credentials');
    expect(credentials?.status).toBe('warning');
    expect(report.ready).toBe(true);
  });

  it('fails when the directory has no documents', async () => {
    setCredentials();
    rmSync(join(docsDir, 'guide.md'));

    const report = await runChecks();

    expect(report.ready).toBe(false);
    expect(report.checks.find((check) => check.name === 'documents')).toMatchObject({
      status: 'error',
      message: `No documents in ${docsDir} (extensions: txt, md)`,
    });
  });

  it('warns about an unknown region', async () => {
    setCredentials();
    writeConfig('[aws]\nregion = "mars-north-1"\n');

    const report = await runChecks();

    expect(report.checks.find((check) => check.name === 'region')).toMatchObject({
      status: 'warning',
      message: 'mars-north-1 is not a known Bedrock region',
    });
  });

  it('reports an invalid config and keeps checking with defaults', async () => {
    setCredentials();
    writeConfig('[search]\ntop_k = "many"\n');

    const report = await runChecks();

    expect(report.ready).toBe(false);
    expect(report.checks[0]).toMatchObject({ name: 'config', status: 'error' });
    expect(report.checks.map((check) => check.name)).toEqual([
      'config',
      'region',
      'credentials',
      'documents',
      'tracing',
    ]);
  });

  it('reports Langfuse when both keys are set', async () => {
    setCredentials();
    process.env['LANGFUSE_PUBLIC_KEY'] = 'pk-test';
    process.env['LANGFUSE_SECRET_KEY'] = 'sk-test';
    _clearEnvCache();

    const report = await runChecks();

    expect(report.checks.find((check) => check.name === 'tracing')).toEqual({
      name: 'tracing',
      status: 'ok',
      message: 'Langfuse at https://cloud.langfuse.com',
    });
  });

  describe('--probe', () => {
    it('embeds a probe text through the primary backend', async () => {
      setCredentials();
      const created: BedrockInvokerOptions[] = [];

      const report = await runChecks({
        probe: true,
        createInvoker: (options) => {
          created.push(options);
          return new FakeInvoker(titanResponder(1536));
        },
      });

      expect(report.checks.at(-1)).toEqual({
        name: 'embedding',
        status: 'ok',
        message: 'amazon.titan-embed-text-v1 (1536 dimensions, primary)',
      });
      expect(created[0]?.region).toBe('eu-central-1');
    });

    it('reports a backend that returns the wrong dimension', async () => {
      setCredentials();

      const report = await runChecks({
        probe: true,
        createInvoker: () => new FakeInvoker(titanResponder(8)),
      });

      expect(report.ready).toBe(false);
      expect(report.checks.at(-1)).toMatchObject({ name: 'embedding', status: 'error' });
    });
  });
});
