import * as path from 'path';
import { watch } from 'fs/promises';
import chalk from 'chalk';
import { cliLogger } from '@core/utils/logger';
import type { CommandContext } from '../utils/command-context';
import { evaluateInput } from './eval';

/**
 * Re-evaluates the module a changed file stands for.
 */
export class ModuleReloader {
  constructor(private readonly context: CommandContext) {}

  /** Returns the reloaded module's name, or undefined for files outside the roots. */
  reload(filePath: string): string | undefined {
    const name = this.context.sources.moduleNameFor(filePath);
    if (!name) {
      return undefined;
    }
    this.context.runtime.load(name, { fresh: true, requester: 'watch' });
    return name;
  }
}

/**
 * Evaluates the inputs once, then reloads modules as their files change
 * until `signal` aborts.
 */
export async function watchCommand(context: CommandContext, signal?: AbortSignal): Promise<void> {
  for (const input of context.options.inputs) {
    evaluateInput(context, input);
  }

  const reloader = new ModuleReloader(context);
  console.log(`Watching for changes in ${context.roots.join(', ')}...`);
  await superviseWatchers(context.roots, (root, rootSignal) => watchRoot(context, reloader, root, rootSignal), signal);
}

/**
 * Runs one watcher per root. The first watcher to fail aborts the others,
 * and the returned promise settles only after all of them have stopped.
 */
export async function superviseWatchers(
  roots: readonly string[],
  run: (root: string, signal: AbortSignal) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const controller = new AbortController();
  const forward = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forward();
  } else {
    signal?.addEventListener('abort', forward, { once: true });
  }

  try {
    const results = await Promise.allSettled(
      roots.map(root =>
        run(root, controller.signal).catch((error: unknown) => {
          controller.abort();
          throw error;
        })
      )
    );
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  } finally {
    signal?.removeEventListener('abort', forward);
  }
}

async function watchRoot(
  context: CommandContext,
  reloader: ModuleReloader,
  root: string,
  signal?: AbortSignal
): Promise<void> {
  cliLogger.info('Starting watch mode', { root });

  try {
    for await (const event of watch(root, { recursive: true, signal })) {
      if (!event.filename) {
        continue;
      }
      const filePath = path.join(root, event.filename);
      try {
        const name = reloader.reload(filePath);
        if (name) {
          console.log(`${chalk.green('↻')} ${name}`);
        }
      } catch (error) {
        context.errorHandler.handleError(error, { debug: context.options.debug });
      }
    }
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return;
    }
    cliLogger.error('Watch mode failed', {
      root,
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }
}
