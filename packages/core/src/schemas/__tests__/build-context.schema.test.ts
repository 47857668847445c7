import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors.js';
import { parseBuildContext } from '../build-context.schema.js';

describe('parseBuildContext', () => {
  it('maps the context file onto a build context', () => {
    expect(
      parseBuildContext({
        build_info: {
          pipeline: 'api',
          branch: 'release/2.1',
          command: 'make test',
          exit_status: 2,
          phase: 'post_command',
          agent: 'linux-large',
        },
        log_excerpt: 'FAIL src/app.test.ts',
      })
    ).toEqual({
      pipeline: 'api',
      branch: 'release/2.1',
      command: 'make test',
      exitStatus: 2,
      phase: 'post_command',
      logExcerpt: 'FAIL src/app.test.ts',
    });
  });

  it('fills defaults for a minimal file', () => {
    expect(parseBuildContext({})).toEqual({
      pipeline: undefined,
      branch: undefined,
      command: undefined,
      exitStatus: undefined,
      phase: 'command',
      logExcerpt: '',
    });
  });

  it('accepts a string exit status', () => {
    expect(parseBuildContext({ build_info: { exit_status: '137' } }).exitStatus).toBe('137');
  });

  it('rejects a log excerpt that is not text', () => {
    let caught: unknown;
    try {
      parseBuildContext({ log_excerpt: 42 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: ErrorCode.INPUT_INVALID });
  });
});
