import { describe, expect, it } from 'vitest';
import {
  Config,
  ConfigError,
  DEFAULT_API_URLS,
  DEFAULT_IGNORED_ROUTES,
  DEFAULT_MASKED_FIELDS,
  DEFAULT_MAX_MASK_DEPTH,
  DEFAULT_TIMEOUT_MS,
} from '../src/index.js';
import { thrown } from './helpers/fakes.js';

describe('ConfigBuilder', () => {
  it('should build a config with the defaults', () => {
    const config = Config.builder('test-key', 'test-project').build();

    expect(config.apiKey).toBe('test-key');
    expect(config.projectId).toBe('test-project');
    expect(config.apiUrls).toEqual(DEFAULT_API_URLS);
    expect(config.primaryApiUrl).toBe('https://rocknrolla.treblle.com');
    expect(config.maskedFields.sources).toEqual(DEFAULT_MASKED_FIELDS);
    expect(config.ignoredRoutes.sources).toEqual(DEFAULT_IGNORED_ROUTES);
    expect(config.maxMaskDepth).toBe(DEFAULT_MAX_MASK_DEPTH);
    expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.nonJsonBodyPolicy).toBe('omit');
    expect(config.endpointStrategy).toBe('primary');
    expect(config.rootCaPath).toBeUndefined();
  });

  it('should be frozen once built', () => {
    const config = Config.builder('test-key', 'test-project').build();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.apiUrls)).toBe(true);
  });

  it.each([
    ['', 'test-project'],
    ['   ', 'test-project'],
    ['test-key', ''],
    ['test-key', '\t'],
  ])('should reject empty credentials (%j, %j)', (apiKey, projectId) => {
    const error = thrown(() => Config.builder(apiKey, projectId).build());

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ kind: 'InvalidCredential' });
  });

  it('should reject an API key with a line break', () => {
    const error = thrown(() => Config.builder('test-key\r\nX-Injected: 1', 'test-project').build());

    expect(error).toMatchObject({ kind: 'InvalidCredential', message: 'API key contains control characters' });
  });

  it('should extend the default masked fields', () => {
    const config = Config.builder('test-key', 'test-project').addMaskedFields(['^email$']).build();

    expect(config.maskedFields.sources).toEqual([...DEFAULT_MASKED_FIELDS, '^email$']);
    expect(config.masking.isSensitive('EMAIL')).toBe(true);
    expect(config.masking.isSensitive('password')).toBe(true);
  });

  it('should replace the defaults with setMaskedFields', () => {
    const config = Config.builder('test-key', 'test-project').setMaskedFields(['email']).build();

    expect(config.masking.isSensitive('email')).toBe(true);
    expect(config.masking.isSensitive('password')).toBe(false);
  });

  it('should extend and replace ignored routes', () => {
    const extended = Config.builder('test-key', 'test-project').addIgnoredRoutes(['^/internal/']).build();
    expect(extended.isIgnored('/internal/jobs')).toBe(true);
    expect(extended.isIgnored('/health')).toBe(true);

    const replaced = Config.builder('test-key', 'test-project').setIgnoredRoutes(['^/internal/']).build();
    expect(replaced.isIgnored('/health')).toBe(false);
  });

  it('should reject invalid patterns at the call that adds them', () => {
    const builder = Config.builder('test-key', 'test-project');

    expect(thrown(() => builder.addMaskedFields(['[a-']))).toMatchObject({ kind: 'InvalidPattern' });
    expect(thrown(() => builder.addIgnoredRoutes(['*']))).toMatchObject({ kind: 'InvalidPattern' });
  });

  it('should reject an empty endpoint list', () => {
    expect(thrown(() => Config.builder('test-key', 'test-project').setApiUrls([]))).toMatchObject({
      kind: 'NoEndpoints',
    });
  });

  it('should reject endpoints that are not http(s) URLs', () => {
    const error = thrown(() => Config.builder('test-key', 'test-project').setApiUrls(['ftp://example.test']));

    expect(error).toMatchObject({ kind: 'NoEndpoints', message: 'Invalid API URL "ftp://example.test"' });
  });

  it('should keep endpoint order with the first as primary', () => {
    const config = Config.builder('test-key', 'test-project')
      .setApiUrls(['https://b.example.test', 'https://a.example.test'])
      .build();

    expect(config.primaryApiUrl).toBe('https://b.example.test');
  });

  it('should validate numeric settings', () => {
    const builder = Config.builder('test-key', 'test-project');

    expect(thrown(() => builder.setMaxMaskDepth(0))).toMatchObject({ kind: 'InvalidShape' });
    expect(thrown(() => builder.setMaxMaskDepth(1.5))).toMatchObject({ kind: 'InvalidShape' });
    expect(thrown(() => builder.setTimeout(-1))).toMatchObject({ kind: 'InvalidShape' });
    expect(thrown(() => builder.setRootCaPath(' '))).toMatchObject({ kind: 'InvalidShape' });
  });

  it('should not expose the full API key when serialized', () => {
    const config = Config.builder('test-secret', 'test-project').build();

    expect(config.toJSON().apiKey).toBe('test****');
    expect(JSON.stringify(config)).not.toContain('test-secret');
  });
});
