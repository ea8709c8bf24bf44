/**
* Sequential demonstration runner.
*
* Sections are numbered from 1 and separated by a fixed divider line. The
* first demonstration that throws ends the run; its error is logged, the
* localized failure line is reported, and the returned `RunReport` names it.
*/

import { format, Messages, SectionId } from '../i18n';
import * as logger from '../utils/logger';

export const SECTION_SEPARATOR = '=======================';

export interface DemoContext {
  messages: Messages;
  /** Plain narration line for stdout. */
  narrate(line: string): void;
}

export interface RunContext extends DemoContext {
  /** Where the failure line goes (stderr in the console program). */
  fail(line: string): void;
}

export interface Demonstration {
  id: SectionId;
  run(ctx: DemoContext): void;
}

export interface RunReport {
  completed: SectionId[];
  failure?: {
    id: SectionId;
    error: Error;
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function runDemonstrations(demos: readonly Demonstration[], ctx: RunContext): RunReport {
  const completed: SectionId[] = [];

  for (const [index, demo] of demos.entries()) {
    if (index > 0) ctx.narrate(SECTION_SEPARATOR);

    const title = ctx.messages.sections[demo.id];
    ctx.narrate(`${index + 1}. ${title}`);
    logger.debug('Demonstration started', { id: demo.id });

    try {
      demo.run({ messages: ctx.messages, narrate: (line) => ctx.narrate(line) });
    } catch (err) {
      const error = toError(err);
      logger.error('Demonstration failed', { id: demo.id, err: error });
      ctx.fail(format(ctx.messages.failed, { section: title, reason: error.message }));
      return { completed, failure: { id: demo.id, error } };
    }

    completed.push(demo.id);
    logger.debug('Demonstration passed', { id: demo.id });
  }

  return { completed };
}

export { AssertionFailure, check, checkEqual, checkThrows } from './assertions';
