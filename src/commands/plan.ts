import { mergeOrder } from '../layers/resolver.js';
import { LayerPlan, OutputFormat } from '../types.js';
import { InputContext, LayerInputOptions, resolveInputs } from './inputs.js';

export interface PlanView {
  canonical: string;
  /** Layers in walk order; earlier entries win collisions */
  layers: string[];
  config_paths: string[];
  parent_dir: string;
}

export function buildPlanView(plan: LayerPlan, parentDir: string): PlanView {
  return {
    canonical: plan.canonicalDataPath,
    layers: mergeOrder(plan),
    config_paths: [...plan.configPaths],
    parent_dir: parentDir,
  };
}

/**
 * Format a plan as string
 *
 * @param format - Output format (text or json)
 */
export function formatPlan(view: PlanView, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(view, null, 2);
  }

  const lines: string[] = [];
  lines.push('Layers (highest precedence first):');
  view.layers.forEach((layer, idx) => {
    const suffix = layer === view.canonical ? ' (canonical)' : '';
    lines.push(`  ${idx + 1}. ${layer}${suffix}`);
  });

  lines.push('Config paths:');
  if (view.config_paths.length === 0) {
    lines.push('  (none)');
  } else {
    for (const configPath of view.config_paths) {
      lines.push(`  - ${configPath}`);
    }
  }

  lines.push(`Overlay parent: ${view.parent_dir}`);
  return lines.join('\n');
}

export interface PlanCommandOptions extends LayerInputOptions {
  format?: string;
}

export function parseFormat(value: string | undefined): OutputFormat {
  const format = value ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new Error(`Unknown format "${format}" (expected text or json)`);
  }
  return format;
}

/**
 * Handle the plan command: resolve layers and print them without touching
 * the filesystem.
 */
export async function handlePlanCommand(
  options: PlanCommandOptions,
  context: InputContext,
  write: (output: string) => void = (output) => console.log(output)
): Promise<PlanView> {
  const format = parseFormat(options.format);
  const { plan, parentDir } = await resolveInputs(options, context);
  const view = buildPlanView(plan, parentDir);
  write(formatPlan(view, format));
  return view;
}
