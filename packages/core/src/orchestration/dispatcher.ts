/**
 * Dispatcher: runs the one terminal action chosen by mode selection on a
 * constructed session. Every failing engine call is printed with its result
 * code and description, and that code is returned as the run's status.
 */

import { describeResult, ResultCode } from '../engine/result.js';
import type { EngineSession } from '../engine/types.js';
import { isDefaultServer } from '../environment.js';
import { saveStringToFile, type SaveResult } from '../storage.js';
import { APP_NAME, type Output, type RuntimeParameters, type SessionConfig } from '../types.js';
import { type ActionMode, putAfterTestFile } from './modes.js';

/** Module and operating-environment ids bound for a FIPS validation. */
export const FIPS_MODULE_ID = 1;
export const FIPS_OE_ID = 1;

export interface DispatchContext {
  output: Output;
  params: RuntimeParameters;
  config: SessionConfig;
  saveFile?: (filePath: string, content: string) => SaveResult;
}

function fail(output: Output, message: string, rv: ResultCode): ResultCode {
  output.error(`${message} (rv=${rv}: ${describeResult(rv)})`);
  return rv;
}

async function reportCost(session: EngineSession, output: Output): Promise<ResultCode> {
  const count = await session.getVectorSetCount();
  if (count < 0) {
    output.error('Unable to get expected vector set count with given test session context.');
    output.error('');
    return ResultCode.INTERNAL_ERR;
  }
  output.log(`The given test session context is expected to generate ${count} vector sets.`);
  output.log('');
  return ResultCode.SUCCESS;
}

async function reportRegistration(
  session: EngineSession,
  saveFile: string | undefined,
  ctx: DispatchContext,
): Promise<ResultCode> {
  const { output } = ctx;
  const registration = await session.getCurrentRegistration();
  if (registration === null) {
    output.error('Error occurred while getting current registration.');
    return ResultCode.INTERNAL_ERR;
  }

  if (!saveFile) {
    output.log(registration);
    output.log('Completed output of current registration. Exiting...');
    return ResultCode.SUCCESS;
  }

  const saved = (ctx.saveFile ?? saveStringToFile)(saveFile, registration);
  if (!saved.ok) {
    output.error(`Error occurred while saving registration to file (${saved.reason}). Exiting...`);
    return ResultCode.INTERNAL_ERR;
  }
  output.log('Successfully saved registration to given file. Exiting...');
  return ResultCode.SUCCESS;
}

/**
 * Steps shared by every mode that reaches the server: the default-server
 * advisory and, when validation is requested, binding the OE metadata.
 */
async function prepareSubmission(session: EngineSession, ctx: DispatchContext): Promise<ResultCode> {
  const { output, params, config } = ctx;

  if (isDefaultServer(params)) {
    output.log('Warning: No server set, using default. Please define AMV_SERVER in your environment.');
    output.log(`Run ${APP_NAME} --help for more information on this and other environment variables.`);
    output.log('');
  }

  if (config.validationMetadataFile) {
    let rv = await session.ingestOeMetadata(config.validationMetadataFile);
    if (rv !== ResultCode.SUCCESS) return fail(output, 'Failed to read validation metadata file', rv);

    rv = await session.setOeFipsMetadata(FIPS_MODULE_ID, FIPS_OE_ID);
    if (rv !== ResultCode.SUCCESS) return fail(output, 'Failed to set metadata for FIPS validation', rv);
  }

  return ResultCode.SUCCESS;
}

/** Report a failing terminal call; its code becomes the run's status. */
async function settle(output: Output, label: string, call: Promise<ResultCode>): Promise<ResultCode> {
  const rv = await call;
  return rv === ResultCode.SUCCESS ? rv : fail(output, label, rv);
}

/**
 * Post-resources and cert-request are modifiers of the run, not gates on it:
 * a failing mark is reported and the run still happens. The first failing
 * mark's code outranks the run's own result.
 */
async function runDefault(
  session: EngineSession,
  mode: Extract<ActionMode, { kind: 'run' }>,
  output: Output,
): Promise<ResultCode> {
  let markRv: ResultCode = ResultCode.SUCCESS;
  if (mode.postResourcesFile) {
    markRv = await settle(output, 'Failed to mark session to post resources', session.markAsPostResources(mode.postResourcesFile));
  }
  if (mode.certReqFile) {
    const rv = await settle(output, 'Failed to mark session as a certification request', session.markAsCertRequest(mode.certReqFile));
    if (markRv === ResultCode.SUCCESS) markRv = rv;
  }

  const runRv = await settle(output, 'Test session run failed', session.run(mode.fipsValidation));
  return markRv !== ResultCode.SUCCESS ? markRv : runRv;
}

type StageMode<S extends ActionMode['stage']> = Extract<ActionMode, { stage: S }>;

function dispatchLocal(session: EngineSession, mode: StageMode<'local'>, ctx: DispatchContext): Promise<ResultCode> {
  const { output } = ctx;
  switch (mode.kind) {
    case 'cost':
      return reportCost(session, output);
    case 'registration':
      return reportRegistration(session, mode.saveFile, ctx);
    case 'kat':
      return settle(output, 'Failed to run known-answer file', session.loadKatFile(mode.katFile));
    case 'offlineVectors':
      return settle(
        output,
        'Failed to process offline vector set',
        session.runVectorsFromFile(mode.requestFile, mode.responseFile),
      );
  }
}

function dispatchSubmit(session: EngineSession, mode: StageMode<'submit'>, output: Output): Promise<ResultCode> {
  switch (mode.kind) {
    case 'uploadVectors':
      return settle(
        output,
        'Failed to upload vector set responses',
        session.uploadVectorsFromFile(mode.uploadFile, mode.fipsValidation),
      );
    case 'putData':
      return settle(output, 'Failed to submit PUT data', session.putDataFromFile(mode.putFile));
  }
}

async function dispatchSession(
  session: EngineSession,
  mode: StageMode<'session'>,
  ctx: DispatchContext,
): Promise<ResultCode> {
  const { output } = ctx;
  // Marking must precede the terminal call: the engine PUTs after the run completes.
  const putFile = putAfterTestFile(ctx.config);
  if (putFile) {
    const rv = await session.markAsPutAfterTest(putFile);
    if (rv !== ResultCode.SUCCESS) return fail(output, 'Failed to mark session to PUT after testing', rv);
  }

  switch (mode.kind) {
    case 'results':
      return settle(output, 'Failed to get results from server', session.getResultsFromServer(mode.sessionFile));
    case 'resume':
      return settle(
        output,
        'Failed to resume test session',
        session.resumeSession(mode.sessionFile, mode.fipsValidation, mode.saveFile),
      );
    case 'cancel':
      return settle(output, 'Failed to cancel test session', session.cancelSession(mode.sessionFile, mode.saveFile));
    case 'expectedResults':
      return settle(
        output,
        'Failed to get expected results',
        session.getExpectedResults(mode.sessionFile, mode.saveFile),
      );
    case 'run':
      return runDefault(session, mode, output);
  }
}

/** Execute exactly one terminal action on a fully constructed session. */
export async function dispatchMode(session: EngineSession, mode: ActionMode, ctx: DispatchContext): Promise<ResultCode> {
  if (mode.stage === 'local') return dispatchLocal(session, mode, ctx);

  const prepared = await prepareSubmission(session, ctx);
  if (prepared !== ResultCode.SUCCESS) return prepared;

  if (mode.stage === 'submit') return dispatchSubmit(session, mode, ctx.output);
  return dispatchSession(session, mode, ctx);
}
