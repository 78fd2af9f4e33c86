/**
 * Command Argument and Result Schema Tests
 */
import { describe, test, expect } from 'vitest';
import {
  NodeStatusSchema,
  purgeTheoriesArgs,
  PurgeTheoriesResultsSchema,
  sessionBuildArgs,
  SessionBuildResultsSchema,
  SessionStartResultSchema,
  SessionStopResultSchema,
  useTheoriesArgs,
  UseTheoriesResultsSchema,
} from '../../src/client/commands';
import { encodeCommand } from '../../src/protocol/command';

describe('argument builders', () => {
  test('sessionBuildArgs leaves out an empty include_sessions', () => {
    expect(sessionBuildArgs('HOL', { include_sessions: [] })).toEqual({ session: 'HOL' });
    expect(sessionBuildArgs('HOL-Library', { dirs: ['lib'], include_sessions: ['HOL'] })).toEqual({
      session: 'HOL-Library',
      dirs: ['lib'],
      include_sessions: ['HOL'],
    });
  });

  test('session arguments encode with wire field names', () => {
    const line = encodeCommand({ name: 'session_start', args: sessionBuildArgs('HOL', { options: ['threads=2'] }) });
    expect(line).toBe('session_start {"session":"HOL","options":["threads=2"]}\n');
  });

  test('useTheoriesArgs copies the theory list', () => {
    const theories = ['A', 'B'];
    const args = useTheoriesArgs('s-1', theories, { master_dir: '/tmp/x' });
    theories.push('C');
    expect(args).toEqual({ session_id: 's-1', theories: ['A', 'B'], master_dir: '/tmp/x' });
  });

  test('purgeTheoriesArgs', () => {
    expect(purgeTheoriesArgs('s-1', ['A'], { all: true })).toEqual({ session_id: 's-1', theories: ['A'], all: true });
  });
});

describe('result schemas', () => {
  test('session_build results', () => {
    const payload = {
      ok: true,
      return_code: 0,
      sessions: [
        { session: 'HOL', ok: true, return_code: 0, timeout: false, timing: { elapsed: 1.5, cpu: 3, gc: 0.1 } },
      ],
    };
    expect(SessionBuildResultsSchema.parse(payload)).toEqual(payload);
  });

  test('session_start result with and without tmp_dir', () => {
    expect(SessionStartResultSchema.parse({ task: 't', session_id: 'abc', tmp_dir: '/tmp/s' })).toEqual({
      task: 't',
      session_id: 'abc',
      tmp_dir: '/tmp/s',
    });
    expect(SessionStartResultSchema.safeParse({ task: 't' }).success).toBe(false);
  });

  test('session_stop result', () => {
    expect(SessionStopResultSchema.parse({ ok: false, return_code: 1 })).toEqual({ ok: false, return_code: 1 });
  });

  test('node status without finished count', () => {
    const status = {
      ok: true,
      total: 4,
      unprocessed: 0,
      running: 0,
      warned: 1,
      failed: 0,
      canceled: false,
      consolidated: true,
      percentage: 100,
    };
    expect(NodeStatusSchema.parse(status)).toEqual(status);
  });

  test('use_theories results', () => {
    const payload = {
      ok: false,
      errors: [{ kind: 'error', message: 'Failed to finish proof', pos: { line: 4, file: 'Scratch.thy' } }],
      nodes: [
        {
          node_name: '/tmp/Scratch.thy',
          theory_name: 'Draft.Scratch',
          status: {
            ok: false,
            total: 2,
            unprocessed: 0,
            running: 0,
            warned: 0,
            failed: 1,
            finished: 1,
            canceled: false,
            consolidated: true,
            percentage: 99,
          },
          messages: [{ kind: 'writeln', message: 'theorem x: True' }],
          exports: [{ name: 'doc', base64: false, body: 'text' }],
        },
      ],
    };
    expect(UseTheoriesResultsSchema.parse(payload)).toEqual(payload);
  });

  test('purge_theories accepts the documented form', () => {
    expect(PurgeTheoriesResultsSchema.parse({ purged: ['A', 'B'] })).toEqual({ purged: ['A', 'B'], retained: [] });
  });

  test('purge_theories accepts node objects with retained list', () => {
    const node = { node_name: '/tmp/A.thy', theory_name: 'Draft.A' };
    expect(PurgeTheoriesResultsSchema.parse({ purged: [node], retained: [] })).toEqual({
      purged: [node],
      retained: [],
    });
  });
});
