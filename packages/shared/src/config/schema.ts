import { z } from 'zod';

export const DEFAULT_TEMPLATE_URL =
  'https://github.com/japaric/cortex-m-quickstart/archive/v{version}.tar.gz';
export const DEFAULT_TEMPLATE_VERSION = '0.1.8';
export const DEFAULT_PRUNE_PATHS = ['build.rs', 'examples', 'memory.x', 'src'];

/**
 * Where the project skeleton comes from and which of its paths are discarded.
 * `urlTemplate` may contain a `{version}` placeholder and may name a local archive.
 */
export const TemplateConfigSchema = z.object({
  urlTemplate: z.string().min(1).default(DEFAULT_TEMPLATE_URL),
  version: z.string().min(1).default(DEFAULT_TEMPLATE_VERSION),
  stripComponents: z.number().int().min(0).default(1),
  prune: z.array(z.string().min(1)).default(DEFAULT_PRUNE_PATHS),
});

export const LibraryConfigSchema = z.object({
  /** Crate name; read from the library's Cargo.toml when omitted */
  name: z.string().min(1).optional(),
});

export const FrameworkConfigSchema = z.object({
  name: z.string().min(1).default('cortex-m-rtfm'),
  version: z.string().min(1).default('0.1.1'),
});

export const LinkStrategySchema = z.enum(['symlink', 'copy']);
export type LinkStrategy = z.infer<typeof LinkStrategySchema>;

export const ExampleOrderSchema = z.enum(['lexicographic', 'directory']);
export type ExampleOrder = z.infer<typeof ExampleOrderSchema>;

export const ExamplesConfigSchema = z.object({
  dir: z.string().min(1).default('examples'),
  link: LinkStrategySchema.default('symlink'),
  order: ExampleOrderSchema.default('lexicographic'),
});

/**
 * The per-example compilation check. The harness appends
 * `--example <name> --target <target>` to `args`.
 */
export const CheckConfigSchema = z.object({
  command: z.string().min(1).default('xargo'),
  args: z.array(z.string()).default(['check']),
  timeoutMs: z.number().int().positive().optional().describe('Per-example check timeout'),
});

export const HarnessConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  target: z.string().min(1, 'target must not be empty'),
  template: TemplateConfigSchema.default({}),
  library: LibraryConfigSchema.default({}),
  framework: FrameworkConfigSchema.default({}),
  examples: ExamplesConfigSchema.default({}),
  check: CheckConfigSchema.default({}),
});

export type TemplateConfig = z.infer<typeof TemplateConfigSchema>;
export type FrameworkConfig = z.infer<typeof FrameworkConfigSchema>;
export type ExamplesConfig = z.infer<typeof ExamplesConfigSchema>;
export type CheckConfig = z.infer<typeof CheckConfigSchema>;
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
/** Config as written in a file or passed as flags, before defaults apply */
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
