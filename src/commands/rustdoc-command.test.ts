/**
 * Unit tests for the rustdoc command: staging, handoff and completion
 */

import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { RustdocCommand } from './rustdoc-command.js';
import {
  CommandCancelledError,
  MissingArgumentError,
  MissingIndexTargetError,
  RemoteStatusError,
  WorkspaceRootNotFoundError,
} from '../errors/index.js';
import { FakeHttpClient, FakeStore, MemoryFs, createTestContext, rustdocPage } from '../__tests__/utils.js';

const WORKSPACE = '/work/app';

function workspaceFs(): MemoryFs {
  return new MemoryFs({ [join(WORKSPACE, 'Cargo.toml')]: '[workspace]' });
}

describe('RustdocCommand', () => {
  const command = new RustdocCommand();

  it('should describe itself', () => {
    expect(command.name).toBe('rustdoc');
    expect(command.description).toBe('insert Rust docs');
    expect(command.menuText).toBe('Insert Rust Documentation');
    expect(command.requiresArgument).toBe(true);
  });

  describe('run', () => {
    it('should wrap stored docs in a single local section', async () => {
      const ctx = createTestContext({ store: new FakeStore({ 'tokio::sync::Mutex': 'Mutex docs' }) });

      const output = await command.run('tokio::sync::Mutex', ctx);

      expect(output).toEqual({
        text: 'Mutex docs',
        sections: [
          {
            range: { start: 0, end: 10 },
            placeholder: { kind: 'rustdoc', source: 'local', crateName: 'tokio', modulePath: 'sync::Mutex' },
          },
        ],
        runCommandsInText: false,
      });
    });

    it('should leave out the module path for a bare crate', async () => {
      const ctx = createTestContext({ store: new FakeStore({ serde: 'serde docs' }) });

      const output = await command.run('serde', ctx);

      expect(output.sections[0]?.placeholder).toEqual({ kind: 'rustdoc', source: 'local', crateName: 'serde' });
    });

    it('should tag remote docs with docs.rs', async () => {
      const http = new FakeHttpClient(200, rustdocPage('Crate anyhow', 'Flexible errors.'));
      const ctx = createTestContext({ http, fs: workspaceFs() });

      const output = await command.run('anyhow', ctx);

      expect(output.text).toBe('# Crate anyhow\n\nFlexible errors.');
      expect(output.sections[0]?.placeholder).toEqual({ kind: 'rustdoc', source: 'docs.rs', crateName: 'anyhow' });
      expect(http.requests.map(r => r.url)).toEqual(['https://docs.rs/anyhow/latest/anyhow/']);
    });

    it('should index through the dispatcher', async () => {
      const ctx = createTestContext({ fs: workspaceFs() });

      const output = await command.run('--index serde', ctx);

      expect(output.text).toBe('Indexed serde');
      expect(output.sections[0]?.placeholder).toEqual({ kind: 'rustdoc-index', source: 'local', crateName: 'serde' });
      expect(ctx.store.indexCalls.map(call => call.crateName)).toEqual(['serde']);
      expect(ctx.store.loads).toEqual([]);
      expect(ctx.http.requests).toEqual([]);
    });

    it('should fail to index outside a Cargo workspace', async () => {
      const ctx = createTestContext();

      await expect(command.run('--index serde', ctx)).rejects.toThrow(WorkspaceRootNotFoundError);
      expect(ctx.store.indexCalls).toEqual([]);
    });

    it('should reject missing arguments before any I/O', async () => {
      const ctx = createTestContext();

      await expect(command.run(undefined, ctx)).rejects.toThrow(MissingArgumentError);
      await expect(command.run('--index', ctx)).rejects.toThrow(MissingIndexTargetError);
      expect(ctx.store.loads).toEqual([]);
    });

    it('should pass remote status errors through', async () => {
      const ctx = createTestContext({ http: new FakeHttpClient(404, 'not found') });

      await expect(command.run('nonexistent_crate', ctx)).rejects.toThrow(RemoteStatusError);
    });

    it('should give the same output for the same state', async () => {
      const ctx = createTestContext({ store: new FakeStore({ serde: 'serde docs' }) });

      const first = await command.run('serde', ctx);
      const second = await command.run('serde', ctx);

      expect(second).toEqual(first);
    });
  });

  describe('state', () => {
    it('should move through every stage on success', async () => {
      const ctx = createTestContext({ store: new FakeStore({ serde: 'serde docs' }) });

      const invocation = command.start('serde', ctx);
      await invocation.output;

      expect(invocation.getHistory()).toEqual(['idle', 'background-running', 'succeeded', 'finalized']);
      expect(invocation.state).toBe('finalized');
    });

    it('should fail from the background stage', async () => {
      const ctx = createTestContext({ http: new FakeHttpClient(404, '') });

      const invocation = command.start('serde', ctx);
      await expect(invocation.output).rejects.toThrow(RemoteStatusError);

      expect(invocation.getHistory()).toEqual(['idle', 'background-running', 'failed']);
    });

    it('should fail straight from idle on a parse error', async () => {
      const invocation = command.start('', createTestContext());
      await expect(invocation.output).rejects.toThrow(MissingArgumentError);

      expect(invocation.getHistory()).toEqual(['idle', 'failed']);
    });
  });

  describe('cancellation', () => {
    it('should produce no output when cancelled before the background stage', async () => {
      const ctx = createTestContext({ store: new FakeStore({ serde: 'serde docs' }) });
      const controller = new AbortController();

      const invocation = command.start('serde', ctx, controller.signal);
      controller.abort();

      await expect(invocation.output).rejects.toThrow(CommandCancelledError);
      await expect(invocation.output).rejects.toThrow('command cancelled during workspace lookup');
      expect(ctx.store.loads).toEqual([]);
      expect(invocation.getHistory()).toEqual(['idle', 'background-running', 'failed']);
    });

    it('should stop before finalizing when cancelled after the handoff', async () => {
      const store = new FakeStore({ serde: 'serde docs' });
      const controller = new AbortController();
      const ctx = createTestContext({ store });
      // Abort as soon as the store has answered
      const load = store.load.bind(store);
      store.load = async (crateName, itemPath) => {
        const text = await load(crateName, itemPath);
        controller.abort();
        return text;
      };

      const invocation = command.start('serde', ctx, controller.signal);

      await expect(invocation.output).rejects.toThrow('command cancelled during finalization');
      expect(invocation.getHistory()).toEqual(['idle', 'background-running', 'succeeded', 'failed']);
    });
  });

  describe('completeArgument', () => {
    it('should format store matches as crate paths', async () => {
      const store = new FakeStore({}, [
        ['tokio', { kind: 'struct', name: 'Mutex', path: ['sync'] }],
        ['tokio', { kind: 'mod', name: 'sync', path: [] }],
      ]);
      const ctx = createTestContext({ store });

      await expect(command.completeArgument('tokio::sync', ctx)).resolves.toEqual([
        'tokio::sync::Mutex',
        'tokio::sync',
      ]);
      expect(store.searches).toEqual(['tokio::sync']);
    });

    it('should return nothing once cancelled', async () => {
      const store = new FakeStore({}, [['tokio', { kind: 'mod', name: 'sync', path: [] }]]);
      const ctx = createTestContext({ store });
      const controller = new AbortController();
      controller.abort();

      await expect(command.completeArgument('sync', ctx, controller.signal)).resolves.toEqual([]);
    });
  });
});
