import { Command } from 'commander';
import { ENV, formatRuntimeSummary, resolveEnvironment, type EnvSource, type Output } from '@amvp-runner/core';

export function createEnvCommand(deps: { env?: EnvSource; output?: Output } = {}): Command {
  const output = deps.output ?? console;

  return new Command('env')
    .description(`Show the runtime parameters resolved from ${Object.values(ENV).join(', ')}`)
    .action(() => {
      for (const line of formatRuntimeSummary(resolveEnvironment(deps.env ?? process.env))) output.log(line);
    });
}
