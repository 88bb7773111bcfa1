import { describe, it, expect } from 'vitest';
import { HarnessConfigSchema, DEFAULT_PRUNE_PATHS } from './schema';

describe('HarnessConfigSchema', () => {
  it('fills every default around a bare target', () => {
    const config = HarnessConfigSchema.parse({ target: 'thumbv7m-none-eabi' });

    expect(config).toEqual({
      configVersion: 1,
      target: 'thumbv7m-none-eabi',
      template: {
        urlTemplate: 'https://github.com/japaric/cortex-m-quickstart/archive/v{version}.tar.gz',
        version: '0.1.8',
        stripComponents: 1,
        prune: DEFAULT_PRUNE_PATHS,
      },
      library: {},
      framework: { name: 'cortex-m-rtfm', version: '0.1.1' },
      examples: { dir: 'examples', link: 'symlink', order: 'lexicographic' },
      check: { command: 'xargo', args: ['check'] },
    });
  });

  it('rejects a missing target', () => {
    const result = HarnessConfigSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['target']);
    }
  });

  it('rejects an unknown link strategy', () => {
    const result = HarnessConfigSchema.safeParse({
      target: 'thumbv7m-none-eabi',
      examples: { link: 'hardlink' },
    });
    expect(result.success).toBe(false);
  });

  it('keeps partial overrides next to defaults', () => {
    const config = HarnessConfigSchema.parse({
      target: 'thumbv7em-none-eabihf',
      check: { command: 'cargo', timeoutMs: 60000 },
    });
    expect(config.check).toEqual({ command: 'cargo', args: ['check'], timeoutMs: 60000 });
  });
});
