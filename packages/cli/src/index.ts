#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, ENV } from '@amvp-runner/core';
import { createEnvCommand } from './commands/env.js';
import { createRunCommand } from './commands/run.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Drive an AMVP test session: register capabilities, run vectors, manage saved sessions')
  .version('0.1.0')
  .addHelpText(
    'after',
    [
      '',
      'Environment:',
      `  ${ENV.server}, ${ENV.port}      server host and port (default localhost:443)`,
      `  ${ENV.uriPrefix}             path segment prepended to every request (default /amvp/v1/)`,
      `  ${ENV.apiContext}            optional API context`,
      `  ${ENV.caFile}                CA bundle used to verify the server`,
      `  ${ENV.certFile}, ${ENV.keyFile}  client certificate and key, both or neither`,
      `  ${ENV.totpSeed}              base64 seed for two-factor tokens`,
    ].join('\n'),
  );

program.addCommand(createRunCommand(), { isDefault: true });
program.addCommand(createEnvCommand());

await program.parseAsync();
