import { parseLogLevel, SessionConfigSchema, type SessionConfig } from '@amvp-runner/core';

/** Option bag as commander hands it to the `run` action. */
export interface RunOptions {
  verbosity?: string;
  disableFips?: boolean;
  sample?: boolean;
  hash?: boolean;
  get?: string;
  post?: string;
  delete?: string;
  saveTo?: string;
  vectorReq?: string;
  vectorRsp?: string;
  vectorUpload?: string;
  manualRegistration?: string;
  kat?: string;
  fipsValidation?: string;
  getCost?: boolean;
  getRegistration?: boolean;
  put?: string;
  emptyAlg?: boolean;
  getResults?: string;
  resumeSession?: string;
  cancelSession?: string;
  getExpectedResults?: string;
  postResources?: string;
  certReq?: string;
  engine?: string;
}

export type ConfigResult = { ok: true; config: SessionConfig } | { ok: false; errors: string[] };

const SESSION_ACTIONS = [
  { flag: '--get-results', option: 'getResults' },
  { flag: '--resume-session', option: 'resumeSession' },
  { flag: '--cancel-session', option: 'cancelSession' },
  { flag: '--get-expected-results', option: 'getExpectedResults' },
] as const;

// Config fields named by the flag a user would type.
const FIELD_FLAGS: Record<string, string> = {
  level: '--verbosity',
  getString: '--get',
  postFile: '--post',
  deleteUrl: '--delete',
  saveFile: '--save-to',
  vectorReqFile: '--vector-req',
  vectorRspFile: '--vector-rsp',
  vectorUploadFile: '--vector-upload',
  regFile: '--manual-registration',
  katFile: '--kat',
  validationMetadataFile: '--fips-validation',
  putFile: '--put',
  emptyAlg: '--empty-alg',
  sessionFile: 'session file',
  postResourcesFile: '--post-resources',
  certReqFile: '--cert-req',
};

export function toSessionConfig(opts: RunOptions): ConfigResult {
  const errors: string[] = [];

  const level = parseLogLevel(opts.verbosity);
  if (level === null) errors.push(`Unknown verbosity level: ${opts.verbosity}`);

  const named = SESSION_ACTIONS.filter((a) => opts[a.option] !== undefined);
  if (named.length > 1) {
    errors.push(`Only one saved-session action may be given: ${named.map((a) => a.flag).join(', ')}`);
  }
  if (errors.length > 0) return { ok: false, errors };

  const parsed = SessionConfigSchema.safeParse({
    level: level ?? undefined,
    disableFips: opts.disableFips ?? false,
    sample: opts.sample ?? false,
    hash: opts.hash ?? false,
    getString: opts.get,
    postFile: opts.post,
    deleteUrl: opts.delete,
    vectorReqFile: opts.vectorReq,
    vectorRspFile: opts.vectorRsp,
    regFile: opts.manualRegistration,
    getCost: opts.getCost ?? false,
    getRegistration: opts.getRegistration ?? false,
    katFile: opts.kat,
    vectorUploadFile: opts.vectorUpload,
    putFile: opts.put,
    emptyAlg: opts.emptyAlg ?? false,
    getResults: opts.getResults !== undefined,
    resumeSession: opts.resumeSession !== undefined,
    cancelSession: opts.cancelSession !== undefined,
    getExpected: opts.getExpectedResults !== undefined,
    sessionFile: named[0] ? opts[named[0].option] : undefined,
    validationMetadataFile: opts.fipsValidation,
    postResourcesFile: opts.postResources,
    certReqFile: opts.certReq,
    saveFile: opts.saveTo,
  });

  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => {
        const field = issue.path.join('.');
        const label = FIELD_FLAGS[field] ?? field;
        return label ? `${label}: ${issue.message}` : issue.message;
      }),
    };
  }
  return { ok: true, config: parsed.data };
}
