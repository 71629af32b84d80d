import {
  DEFAULT_API_CONTEXT,
  DEFAULT_PORT,
  DEFAULT_SERVER,
  DEFAULT_URI_PREFIX,
  type RuntimeParameters,
  RuntimeParametersSchema,
} from './types.js';

export const ENV = {
  server: 'AMV_SERVER',
  port: 'AMV_PORT',
  uriPrefix: 'AMV_URI_PREFIX',
  apiContext: 'AMV_API_CONTEXT',
  caFile: 'AMV_CA_FILE',
  certFile: 'AMV_CERT_FILE',
  keyFile: 'AMV_KEY_FILE',
  totpSeed: 'AMV_TOTP_SEED',
} as const;

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface ResolvedEnvironment {
  params: RuntimeParameters;
  /** Variables that were set but could not be used. */
  warnings: string[];
}

function read(env: EnvSource, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parse a port the way `atoi` would (leading digits, surrounding junk ignored),
 * falling back to the default for anything that is not a usable TCP port.
 */
export function parsePort(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_PORT;
  const port = Number.parseInt(raw, 10);
  if (!Number.isFinite(port) || port <= 0 || port > 65535) return DEFAULT_PORT;
  return port;
}

export function resolveEnvironment(env: EnvSource): ResolvedEnvironment {
  const warnings: string[] = [];
  const certFile = read(env, ENV.certFile);
  const keyFile = read(env, ENV.keyFile);

  if (certFile && !keyFile) {
    warnings.push(`${ENV.certFile} is set without ${ENV.keyFile}; client certificate ignored`);
  } else if (keyFile && !certFile) {
    warnings.push(`${ENV.keyFile} is set without ${ENV.certFile}; client key ignored`);
  }

  const params = RuntimeParametersSchema.parse({
    server: read(env, ENV.server) ?? DEFAULT_SERVER,
    port: parsePort(read(env, ENV.port)),
    pathSegment: read(env, ENV.uriPrefix) ?? DEFAULT_URI_PREFIX,
    apiContext: env[ENV.apiContext] ?? DEFAULT_API_CONTEXT,
    caFile: read(env, ENV.caFile),
    clientAuth: certFile && keyFile ? { certFile, keyFile } : undefined,
    totpSeed: read(env, ENV.totpSeed),
  });

  return { params: Object.freeze(params), warnings };
}

export function resolveRuntimeParameters(env: EnvSource): RuntimeParameters {
  return resolveEnvironment(env).params;
}

export function isDefaultServer(params: RuntimeParameters): boolean {
  return params.server === DEFAULT_SERVER;
}

/** Human-readable summary printed before the session is built. */
export function formatRuntimeSummary(resolved: ResolvedEnvironment): string[] {
  const { params, warnings } = resolved;
  const lines = [
    'Using the following parameters:',
    '',
    `    ${ENV.server}:     ${params.server}`,
    `    ${ENV.port}:       ${params.port}`,
    `    ${ENV.uriPrefix}: ${params.pathSegment}`,
  ];

  if (params.apiContext) lines.push(`    ${ENV.apiContext}: ${params.apiContext}`);
  if (params.caFile) lines.push(`    ${ENV.caFile}:    ${params.caFile}`);
  if (params.clientAuth) {
    lines.push(`    ${ENV.certFile}:  ${params.clientAuth.certFile}`);
    lines.push(`    ${ENV.keyFile}:   ${params.clientAuth.keyFile}`);
  }
  if (params.totpSeed) lines.push(`    ${ENV.totpSeed}:  (set)`);
  for (const w of warnings) lines.push(`    Note: ${w}`);

  lines.push('');
  return lines;
}
