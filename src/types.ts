import { z } from 'zod';

// ============================================
// Configuration
// ============================================

const relativeSuffix = z
  .string()
  .min(1)
  .refine((value) => !value.startsWith('/') && !value.split(/[\\/]/).includes('..'), {
    message: 'must be a relative path without ".." segments',
  });

export const StrataConfigSchema = z.object({
  app_id: z.string().min(1).regex(/^[A-Za-z0-9._-]+$/, 'must be a plain directory name'),
  marker: z.string().min(1),
  data_suffix: relativeSuffix,
  config_suffix: relativeSuffix,
  data_dir_key: z.string().min(1),
  config_path_key: z.string().min(1),
  data_home: z.string().min(1).optional(),
});

export type StrataConfig = z.infer<typeof StrataConfigSchema>;

export const DEFAULT_CONFIG: StrataConfig = {
  app_id: 'strata',
  marker: 'site-packages',
  data_suffix: 'share/jupyter',
  config_suffix: 'etc/jupyter',
  data_dir_key: 'JUPYTER_DATA_DIR',
  config_path_key: 'JUPYTER_CONFIG_PATH',
};

// ============================================
// Interpreter probe
// ============================================

export const ProbeResultSchema = z.object({
  prefix: z.string().min(1),
  path: z.array(z.string()),
});

export type ProbeResult = z.infer<typeof ProbeResultSchema>;

// ============================================
// Layers
// ============================================

/**
 * One isolated installation root and the two subtrees derived from it.
 */
export interface Layer {
  searchRoot: string;
  dataPath: string;
  configPath: string;
}

/**
 * Result of layer resolution. Immutable once computed.
 *
 * `dataPaths` starts with the canonical data path, followed by every
 * discovered environment's data path in encounter order.
 */
export interface LayerPlan {
  canonicalDataPath: string;
  dataPaths: readonly string[];
  configPaths: readonly string[];
}

export interface LayerOptions {
  marker: string;
  dataSuffix: string;
  configSuffix: string;
}

// ============================================
// Overlay
// ============================================

export type ProjectionOutcome =
  | { kind: 'linked'; source: string; destination: string }
  | { kind: 'skipped'; reason: 'exists'; source: string; destination: string };

export interface LayerReport {
  layer: string;
  linked: number;
  skipped: number;
  /** Symlinks, sockets, FIFOs and devices met during the walk */
  ignored: number;
}

export interface Collision {
  relativePath: string;
  /** Layer whose copy was not projected */
  layer: string;
}

export interface BuildReport {
  destination: string;
  layers: LayerReport[];
  linked: number;
  skipped: number;
  ignored: number;
  collisions: Collision[];
}

/**
 * Published state handed to the downstream consumer.
 */
export interface OverlayEnvironment {
  dataDir: string;
  configPaths: readonly string[];
}

export interface EnvironmentKeys {
  dataDirKey: string;
  configPathKey: string;
}

export type OutputFormat = 'text' | 'json';
