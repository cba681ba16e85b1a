import execa from 'execa';
import { toEnvironmentVariables } from '../overlay/environment.js';
import { OverlayScopeOptions, OverlaySession, withOverlay } from '../overlay/lifecycle.js';
import { describeError } from '../errors.js';
import { InputContext, LayerInputOptions, resolveInputs } from './inputs.js';

export type ChildRunner = (
  command: string,
  args: string[],
  env: Record<string, string>
) => Promise<number>;

const runInherited: ChildRunner = async (command, args, env) => {
  try {
    const result = await execa(command, args, { stdio: 'inherit', env, extendEnv: true });
    return result.exitCode;
  } catch (error) {
    // A non-zero exit rejects with the exit code attached
    if (typeof error === 'object' && error !== null && 'exitCode' in error && typeof error.exitCode === 'number') {
      return error.exitCode;
    }
    throw error;
  }
};

export interface ExecContext extends InputContext {
  run?: ChildRunner;
  /** Extra scope settings (termination source, exit), used by tests */
  scope?: Omit<OverlayScopeOptions, 'parentDir'>;
}

/**
 * Handle the exec command: build the overlay, run the command with the
 * published variables in its environment, then release the overlay.
 *
 * @returns Exit code of the command
 */
export async function handleExecCommand(
  command: string,
  args: string[],
  options: LayerInputOptions,
  context: ExecContext
): Promise<number> {
  const { logger } = context;
  const { plan, parentDir, keys } = await resolveInputs(options, context);
  const run = context.run ?? runInherited;

  return withOverlay(
    {
      plan,
      scope: {
        parentDir,
        onReleaseError: (error, dir) => logger.warn(`Failed to remove overlay ${dir}: ${describeError(error)}`),
        ...context.scope,
      },
      hooks: {
        onProjection: (outcome) => {
          if (outcome.kind === 'skipped') {
            logger.debug(`skip ${outcome.source} (already provided)`);
          } else {
            logger.debug(`link ${outcome.source}`);
          }
        },
      },
    },
    async ({ environment, report }: OverlaySession) => {
      logger.info(
        `Merged ${plan.dataPaths.length} layer(s) into ${environment.dataDir} ` +
        `(${report.linked} linked, ${report.skipped} shadowed)`
      );

      const variables = toEnvironmentVariables(environment, keys);
      for (const [key, value] of Object.entries(variables)) {
        logger.debug(`${key}=${value}`);
      }

      logger.divider();
      return run(command, args, variables);
    }
  );
}
