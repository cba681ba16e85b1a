import execa from 'execa';
import { z } from 'zod';
import { OverlayError, describeError } from '../errors.js';
import { ProbeResult, ProbeResultSchema } from '../types.js';

/**
 * Program handed to the interpreter: prints its installation prefix and its
 * library search path as one JSON line.
 */
export const PROBE_PROGRAM =
  "import json, sys; print(json.dumps({'prefix': sys.prefix, 'path': sys.path}))";

export function parseProbeOutput(stdout: string, executable: string): ProbeResult {
  // Startup hooks may print before the probe runs; the JSON line is last
  const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (last === undefined) {
    throw new OverlayError('PROBE_FAILED', `Interpreter ${executable} printed nothing`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(last);
  } catch (error) {
    throw new OverlayError(
      'PROBE_FAILED',
      `Interpreter ${executable} printed invalid JSON: ${describeError(error)}`
    );
  }

  try {
    return ProbeResultSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const formattedErrors = error.errors
        .map(err => `  - ${err.path.join('.')}: ${err.message}`)
        .join('\n');
      throw new OverlayError(
        'PROBE_FAILED',
        `Interpreter ${executable} returned an unexpected shape:\n${formattedErrors}`
      );
    }
    throw error;
  }
}

/**
 * Ask an interpreter for its search path and installation prefix.
 */
export async function probeInterpreter(executable: string): Promise<ProbeResult> {
  let stdout: string;
  try {
    const result = await execa(executable, ['-c', PROBE_PROGRAM], { reject: true });
    stdout = result.stdout;
  } catch (error) {
    throw new OverlayError(
      'PROBE_FAILED',
      `Failed to probe interpreter ${executable}: ${describeError(error)}`,
      'Pass --search-path and --prefix explicitly to skip the probe',
      { cause: error }
    );
  }
  return parseProbeOutput(stdout, executable);
}
