import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '@leansmith/shared';
import { ConfigLoader } from './loader';

describe('ConfigLoader', () => {
  let root: string;
  let homeDir: string;
  let cwd: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'leansmith-config-'));
    homeDir = path.join(root, 'home');
    cwd = path.join(root, 'repo');
    await fs.mkdir(path.join(homeDir, '.leansmith'), { recursive: true });
    await fs.mkdir(cwd, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const writeUser = (content: unknown) =>
    fs.writeFile(path.join(homeDir, '.leansmith', 'config.yaml'), yaml.dump(content));
  const writeRepo = (content: unknown) => fs.writeFile(path.join(cwd, '.leansmith.yaml'), yaml.dump(content));

  describe('load', () => {
    it('returns the schema defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd, homeDir, env: {} });

      expect(config.workflow.maxAttempts).toBe(5);
      expect(config.workflow.maxVerificationRounds).toBe(3);
      expect(config.retrieval.chunkSize).toBe(1000);
      expect(config.retrieval.overlapSize).toBe(200);
      expect(config.compiler.timeoutMs).toBe(60_000);
      expect(config.providers.planner).toEqual({ type: 'openai', model: 'gpt-4o' });
    });

    it('respects precedence: flags > env > explicit > repo > user', async () => {
      await writeUser({ workflow: { maxAttempts: 1, maxVerificationRounds: 1 }, retrieval: { maxChunks: 1 } });
      await writeRepo({ workflow: { maxAttempts: 2 }, retrieval: { maxChunks: 2, chunkSize: 500 } });
      const explicitPath = path.join(root, 'explicit.yaml');
      await fs.writeFile(explicitPath, yaml.dump({ workflow: { maxAttempts: 3 }, retrieval: { maxChunks: 3 } }));

      const config = ConfigLoader.load({
        cwd,
        homeDir,
        configPath: explicitPath,
        env: { MAX_CHUNKS: '4' },
        flags: { workflow: { maxAttempts: 9 } },
      });

      expect(config.workflow.maxAttempts).toBe(9);
      expect(config.workflow.maxVerificationRounds).toBe(1);
      expect(config.retrieval.maxChunks).toBe(4);
      expect(config.retrieval.chunkSize).toBe(500);
    });

    it('fails if the explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ cwd, homeDir, env: {}, configPath: 'missing.yaml' })).toThrow(
        'Config file not found: missing.yaml',
      );
    });

    it('lists every validation issue', async () => {
      await writeRepo({ workflow: { maxAttempts: 0 }, retrieval: { chunkSize: 100, overlapSize: 100 } });

      expect(() => ConfigLoader.load({ cwd, homeDir, env: {} })).toThrow(
        'Configuration validation failed:\n' +
          '- workflow.maxAttempts: Number must be greater than or equal to 1\n' +
          '- retrieval.overlapSize: overlapSize must be smaller than chunkSize',
      );
    });

    it('rejects YAML that does not parse', async () => {
      await fs.writeFile(path.join(cwd, '.leansmith.yaml'), 'workflow: [unclosed');

      expect(() => ConfigLoader.load({ cwd, homeDir, env: {} })).toThrow(ConfigError);
    });

    it('rejects a file that is not a mapping', async () => {
      await fs.writeFile(path.join(cwd, '.leansmith.yaml'), '- one\n- two\n');

      expect(() => ConfigLoader.load({ cwd, homeDir, env: {} })).toThrow(
        `Config file must contain a mapping: ${path.join(cwd, '.leansmith.yaml')}`,
      );
    });

    it('treats an empty file as no configuration', async () => {
      await fs.writeFile(path.join(cwd, '.leansmith.yaml'), '');

      expect(ConfigLoader.load({ cwd, homeDir, env: {} }).workflow.maxAttempts).toBe(5);
    });
  });

  describe('environment overrides', () => {
    it('sets models on the providers the roles point at', async () => {
      await writeRepo({
        providers: {
          main: { type: 'fake', model: 'm1' },
          cheap: { type: 'fake', model: 'm2' },
        },
        defaults: { planner: 'main', generator: 'main', verifier: 'cheap' },
      });

      const config = ConfigLoader.load({
        cwd,
        homeDir,
        env: { GPT4_MODEL: 'big-model', VERIFIER_MODEL: 'small-model', EMBEDDING_MODEL: 'embed-model' },
      });

      expect(config.providers.main?.model).toBe('big-model');
      expect(config.providers.cheap?.model).toBe('small-model');
      expect(config.retrieval.embeddings.model).toBe('embed-model');
    });

    it('prefers PLANNER_MODEL over GPT4_MODEL', () => {
      const config = ConfigLoader.load({ cwd, homeDir, env: { PLANNER_MODEL: 'a', GPT4_MODEL: 'b' } });

      expect(config.providers.planner?.model).toBe('a');
    });

    it('converts LEAN_TIMEOUT and RETRY_DELAY from seconds', () => {
      const config = ConfigLoader.load({ cwd, homeDir, env: { LEAN_TIMEOUT: '90', RETRY_DELAY: '0.5' } });

      expect(config.compiler.timeoutMs).toBe(90_000);
      expect(config.retry.initialDelayMs).toBe(500);
    });

    it('reads chunking numbers', () => {
      const config = ConfigLoader.load({ cwd, homeDir, env: { CHUNK_SIZE: '400', OVERLAP_SIZE: '0' } });

      expect(config.retrieval.chunkSize).toBe(400);
      expect(config.retrieval.overlapSize).toBe(0);
    });

    it('rejects non-numeric values', () => {
      expect(() => ConfigLoader.load({ cwd, homeDir, env: { CHUNK_SIZE: 'big' } })).toThrow(
        "Invalid value for CHUNK_SIZE: 'big' (expected a positive integer)",
      );
    });

    it('validates the overridden values', () => {
      expect(() => ConfigLoader.load({ cwd, homeDir, env: { OVERLAP_SIZE: '1000' } })).toThrow(
        'Configuration validation failed:\n- retrieval.overlapSize: overlapSize must be smaller than chunkSize',
      );
    });
  });

  describe('mergeConfigs', () => {
    it('merges objects and replaces arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { compiler: { command: 'lake', args: ['lean'] }, keep: 1 },
        { compiler: { args: ['env', 'lean'] }, skipped: undefined },
      );

      expect(merged).toEqual({ compiler: { command: 'lake', args: ['env', 'lean'] }, keep: 1 });
    });
  });
});
