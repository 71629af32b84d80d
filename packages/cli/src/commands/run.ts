import { Command } from 'commander';
import chalk, { type ChalkInstance } from 'chalk';
import { runSession, type EnvSource, type FipsProvider, type Output } from '@amvp-runner/core';
import { loadEngine, type LoadEngineResult } from '../engine-loader.js';
import { toSessionConfig, type RunOptions } from '../options.js';

export interface RunCommandDeps {
  loadEngine?: (moduleRef?: string) => Promise<LoadEngineResult>;
  env?: EnvSource;
  fipsProvider?: FipsProvider;
  output?: Output;
  colors?: ChalkInstance;
  sleep?: (ms: number) => Promise<unknown>;
  setExitCode?: (code: number) => void;
}

function defaultSetExitCode(code: number): void {
  process.exitCode = code;
}

export function createRunCommand(deps: RunCommandDeps = {}): Command {
  const output = deps.output ?? console;
  const colors = deps.colors ?? chalk;
  const setExitCode = deps.setExitCode ?? defaultSetExitCode;
  const fail = (message: string) => {
    output.error(`${colors.red('Error:')} ${message}`);
    setExitCode(1);
  };

  return new Command('run')
    .description('Create a test session and run the selected action (default)')
    .option('-v, --verbosity <level>', 'engine log level: none, error, warn, status, info, verbose, debug')
    .option('--disable-fips', 'bypass FIPS mode enforcement')
    .option('--sample', 'mark the test session as a sample')
    .option('--hash', 'register the hash capability')
    .option('--get <query>', 'issue a single GET request')
    .option('--post <file>', 'POST the given file')
    .option('--delete <url>', 'issue a DELETE for the given resource')
    .option('--save-to <file>', 'save output of a GET, registration or resumed session to a file')
    .option('--vector-req <file>', 'request vectors and save them to a file, or read them offline with --vector-rsp')
    .option('--vector-rsp <file>', 'write offline responses to a file')
    .option('--vector-upload <file>', 'upload vector set responses')
    .option('--manual-registration <file>', 'register with a JSON registration file')
    .option('--kat <file>', 'run a known-answer test file')
    .option('--fips-validation <file>', 'request FIPS validation using operating environment metadata')
    .option('--get-cost', 'report how many vector sets the registration generates')
    .option('--get-registration', 'print or save the current registration')
    .option('--put <file>', 'PUT the given file after testing')
    .option('--empty-alg', 'PUT immediately, without algorithm testing')
    .option('--get-results <session file>', 'fetch results of a saved session')
    .option('--resume-session <session file>', 'resume a saved session')
    .option('--cancel-session <session file>', 'cancel a saved session')
    .option('--get-expected-results <session file>', 'fetch expected results of a saved session')
    .option('--post-resources <file>', 'POST resources before the run')
    .option('--cert-req <file>', 'submit a certificate request')
    .option('--engine <module>', 'protocol engine module exporting createEngine (default: offline dry run)')
    .action(async (opts: RunOptions) => {
      const parsed = toSessionConfig(opts);
      if (!parsed.ok) {
        for (const message of parsed.errors) fail(message);
        return;
      }

      const loaded = await (deps.loadEngine ?? loadEngine)(opts.engine);
      if (!loaded.ok) {
        fail(loaded.reason);
        return;
      }

      const outcome = await runSession(parsed.config, {
        engine: loaded.engine,
        env: deps.env,
        fipsProvider: deps.fipsProvider,
        output,
        colors,
        sleep: deps.sleep,
      });
      setExitCode(outcome.exitCode);
    });
}
