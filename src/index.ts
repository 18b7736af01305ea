#!/usr/bin/env node
/**
 * tubesplice CLI entry point.
 *
 *   tubesplice run batch.txt --output out.mp4 --transitions
 *
 * Ctrl+C once cancels the run (work already in flight finishes first);
 * a second Ctrl+C exits immediately.
 */
import { USAGE, parseCli } from './cli.js';
import { TubespliceError } from './errors.js';
import { ConsoleReporter } from './monitoring/reporter.js';
import { createMergeEngine, loadBatchFile } from './pipeline/index.js';
import { logger } from './utils/logger.js';

async function main(): Promise<number> {
  const command = parseCli(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      process.stdout.write(`${USAGE}\n`);
      return 0;

    case 'usage-error':
      process.stderr.write(`${command.message}\n\n${USAGE}\n`);
      return 2;

    case 'run': {
      const entries = await loadBatchFile(command.batchFile);
      const reporter = new ConsoleReporter();
      const engine = await createMergeEngine(entries, command.settings, {
        logSink: reporter,
        progressSink: reporter,
      });

      let interrupts = 0;
      const onSigint = (): void => {
        interrupts += 1;
        if (interrupts > 1) process.exit(130);
        engine.cancel();
      };
      process.on('SIGINT', onSigint);

      try {
        const ok = await engine.run();
        if (!ok && engine.lastFailure) {
          logger.error('tubesplice: run failed', { ...engine.lastFailure });
        }
        return ok ? 0 : 1;
      } finally {
        process.off('SIGINT', onSigint);
      }
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof TubespliceError) {
      logger.error(`tubesplice: ${err.message}`, { code: err.code });
    } else {
      logger.error('Fatal startup error', { err });
    }
    process.exitCode = 1;
  });
