import { z } from 'zod';

// ── Constants ───────────────────────────────────────────────────

export const DEFAULT_SERVER = 'localhost';
export const DEFAULT_PORT = 443;
export const DEFAULT_URI_PREFIX = '/amvp/v1/';
export const DEFAULT_API_CONTEXT = '';
export const APP_NAME = 'amvp-runner';

/** How long the bypassed FIPS gate holds the run before continuing. */
export const FIPS_BYPASS_DELAY_MS = 5_000;

// ── Log levels ──────────────────────────────────────────────────

export const LogLevel = {
  NONE: 0,
  ERR: 1,
  WARN: 2,
  STATUS: 3,
  INFO: 4,
  VERBOSE: 5,
  DEBUG: 6,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LOG_LEVEL_NAMES: Record<string, LogLevel> = {
  none: LogLevel.NONE,
  error: LogLevel.ERR,
  warn: LogLevel.WARN,
  status: LogLevel.STATUS,
  info: LogLevel.INFO,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
};

// ── Runtime parameters ──────────────────────────────────────────

export const ClientAuthSchema = z.object({
  certFile: z.string().min(1),
  keyFile: z.string().min(1),
});

export type ClientAuth = z.infer<typeof ClientAuthSchema>;

export const RuntimeParametersSchema = z.object({
  server: z.string().min(1),
  port: z.number().int().positive().max(65535),
  pathSegment: z.string(),
  apiContext: z.string(),
  caFile: z.string().min(1).optional(),
  clientAuth: ClientAuthSchema.optional(),
  totpSeed: z.string().min(1).optional(),
});

export type RuntimeParameters = Readonly<z.infer<typeof RuntimeParametersSchema>>;

// ── Session config ──────────────────────────────────────────────

const path = z.string().min(1);

export const SessionConfigSchema = z
  .object({
    level: z.nativeEnum(LogLevel).default(LogLevel.STATUS),
    disableFips: z.boolean().default(false),

    // Construction-time modifiers
    sample: z.boolean().default(false),
    hash: z.boolean().default(false),
    getString: z.string().min(1).optional(),
    postFile: path.optional(),
    deleteUrl: z.string().min(1).optional(),
    vectorReqFile: path.optional(),
    vectorRspFile: path.optional(),
    regFile: path.optional(),

    // Terminal actions
    getCost: z.boolean().default(false),
    getRegistration: z.boolean().default(false),
    katFile: path.optional(),
    vectorUploadFile: path.optional(),
    putFile: path.optional(),
    emptyAlg: z.boolean().default(false),
    getResults: z.boolean().default(false),
    resumeSession: z.boolean().default(false),
    cancelSession: z.boolean().default(false),
    getExpected: z.boolean().default(false),
    sessionFile: path.optional(),

    // Modifiers of the default run
    validationMetadataFile: path.optional(),
    postResourcesFile: path.optional(),
    certReqFile: path.optional(),
    saveFile: path.optional(),
  })
  .superRefine((config, ctx) => {
    const needsSessionFile =
      config.getResults || config.resumeSession || config.cancelSession || config.getExpected;
    if (needsSessionFile && !config.sessionFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sessionFile'],
        message: 'A session file is required to fetch results, resume, cancel, or fetch expected results',
      });
    }
    if (config.emptyAlg && !config.putFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['emptyAlg'],
        message: 'An empty-algorithm PUT needs a file to submit',
      });
    }
  });

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

// ── Hash capabilities ───────────────────────────────────────────

export const HashAlgorithm = z.enum(['SHA-1', 'SHA2-224', 'SHA2-256', 'SHA2-384', 'SHA2-512']);
export type HashAlgorithm = z.infer<typeof HashAlgorithm>;

export const HashParameter = z.enum(['messageLength']);
export type HashParameter = z.infer<typeof HashParameter>;

export interface HashDomain {
  min: number;
  max: number;
  increment: number;
}

export interface HashTestCase {
  tcId: number;
  algorithm: HashAlgorithm;
  /** Hex-encoded message. */
  msg: string;
}

// ── Output ──────────────────────────────────────────────────────

/** Line sink for everything the runner prints. `console` satisfies it. */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}
