/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking. Keys are stubbed
 * to '' where a test needs them unset, since the real environment may carry
 * them.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  getOpenAICompatibleConfig,
  isOpenAICompatibleConfigured,
  _clearEnvCache,
} from '../env.js';

function clearProviderEnv(): void {
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.stubEnv('OLLAMA_HOST', '');
  vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', '');
  vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', '');
  vi.stubEnv('OPENAI_COMPATIBLE_MODEL', '');
  vi.stubEnv('RADV_HOME', '');
}

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
    clearProviderEnv();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads OPENAI_API_KEY when set', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');

      expect(loadEnv().OPENAI_API_KEY).toBe('test-secret');
    });

    it('treats blank values as unset', () => {
      const env = loadEnv();

      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.RADV_HOME).toBeUndefined();
    });

    it('provides default OLLAMA_HOST when not set', () => {
      expect(loadEnv().OLLAMA_HOST).toBe('http://localhost:11434');
    });

    it('uses custom OLLAMA_HOST when set', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://192.168.1.100:11434');

      expect(loadEnv().OLLAMA_HOST).toBe('http://192.168.1.100:11434');
    });

    it('trims surrounding whitespace', () => {
      vi.stubEnv('RADV_HOME', '  /tmp/radv-test  ');

      expect(loadEnv().RADV_HOME).toBe('/tmp/radv-test');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('OPENAI_API_KEY', 'initial-value');
      loadEnv();

      vi.stubEnv('OPENAI_API_KEY', 'changed-value');

      expect(loadEnv().OPENAI_API_KEY).toBe('initial-value');
    });

    it('returns fresh values after cache is cleared', () => {
      vi.stubEnv('OPENAI_API_KEY', 'initial-value');
      loadEnv();

      _clearEnvCache();
      vi.stubEnv('OPENAI_API_KEY', 'new-value');

      expect(loadEnv().OPENAI_API_KEY).toBe('new-value');
    });
  });

  describe('getEnv()', () => {
    it('returns the value for a specific key', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');

      expect(getEnv('OPENAI_API_KEY')).toBe('test-secret');
    });

    it('returns default for OLLAMA_HOST when unset', () => {
      expect(getEnv('OLLAMA_HOST')).toBe('http://localhost:11434');
    });
  });

  describe('hasApiKey()', () => {
    it('returns true when openai key exists', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');

      expect(hasApiKey('openai')).toBe(true);
    });

    it('returns false when key is missing', () => {
      expect(hasApiKey('openai')).toBe(false);
      expect(hasApiKey('openai-compatible')).toBe(false);
    });

    it('returns false when key is only whitespace', () => {
      vi.stubEnv('OPENAI_API_KEY', '   ');

      expect(hasApiKey('openai')).toBe(false);
    });
  });

  describe('getOllamaHost()', () => {
    it('returns custom host when configured', () => {
      vi.stubEnv('OLLAMA_HOST', 'https://ollama.internal.test');

      expect(getOllamaHost()).toBe('https://ollama.internal.test');
    });
  });

  describe('OpenAI-compatible settings', () => {
    it('is configured only with both key and base URL', () => {
      vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', 'test-secret');
      expect(isOpenAICompatibleConfigured()).toBe(false);

      _clearEnvCache();
      vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', 'http://localhost:8000/v1');
      vi.stubEnv('OPENAI_COMPATIBLE_MODEL', 'local-model');

      expect(isOpenAICompatibleConfigured()).toBe(true);
      expect(getOpenAICompatibleConfig()).toEqual({
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:8000/v1',
        model: 'local-model',
      });
    });
  });
});
