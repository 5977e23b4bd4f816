/**
 * End-to-end tests for the relay, with Maya and debugpy replaced by
 * in-memory sockets and the debugger by in-memory stdio.
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { PassThrough } from 'node:stream';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { FrameDecoder, FramingError, encodeFrame } from '../../src/dap/framing.js';
import { DebuggerChannel } from '../../src/dap/stdio-channel.js';
import { formatExecCommand, formatRemediation, formatRunDirective } from '../../src/host/templates.js';
import { Relay } from '../../src/relay/relay.js';
import { silentLogger, type Logger } from '../../src/util/logger.js';
import type { HostAddress } from '../../src/util/net.js';
import { FakeSocket } from '../helpers/fake-socket.js';

const PROGRAM = '/home/artist/tools/rig_check.py';

function request(seq: number, command: string, args?: unknown): Buffer {
  return encodeFrame(JSON.stringify({ seq, type: 'request', command, arguments: args }));
}

const attachArguments = {
  program: PROGRAM,
  maya: { host: '127.0.0.1', port: 7001 },
  debugpy: { host: 'localhost', port: 5678 },
};

describe('Relay', () => {
  let tempDir: string;
  let input: PassThrough;
  let output: PassThrough;
  let toDebugger: Array<Record<string, unknown>>;
  let hostSocket: FakeSocket;
  let engineSocket: FakeSocket;
  let hostConnector: Mock<(address: HostAddress) => Promise<FakeSocket>>;
  let engineConnector: Mock<(address: HostAddress) => Promise<FakeSocket>>;
  let terminate: Mock<(exitCode: number) => void>;
  let logger: { [K in keyof Logger]: Mock<Logger[K]> };
  let relay: Relay;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'relay-test-'));
    input = new PassThrough();
    output = new PassThrough();
    toDebugger = [];
    const decoder = new FrameDecoder();
    output.on('data', (chunk: Buffer) => {
      for (const body of decoder.push(chunk)) {
        toDebugger.push(JSON.parse(body) as Record<string, unknown>);
      }
    });

    hostSocket = new FakeSocket();
    engineSocket = new FakeSocket();
    hostConnector = vi.fn(async (_address: HostAddress) => hostSocket);
    engineConnector = vi.fn(async (_address: HostAddress) => engineSocket);
    terminate = vi.fn();
    logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };

    relay = new Relay({
      channel: new DebuggerChannel(input, output, silentLogger),
      logger,
      terminate,
      hostTimeoutMs: 500,
      hostConnector,
      engineConnector,
      tempDir,
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('bootstraps a session and relays both directions', async () => {
    const running = relay.run();

    input.write(request(1, 'initialize', { adapterID: 'python' }));
    input.write(request(2, 'attach', attachArguments));
    input.write(request(3, 'setBreakpoints', { source: { path: PROGRAM }, breakpoints: [{ line: 12 }] }));
    input.write(request(4, 'configurationDone'));

    // debugpy sees the debugger's requests in order, attach rewritten
    await vi.waitFor(() => expect(engineSocket.writtenMessages()).toHaveLength(4));
    const atEngine = engineSocket.writtenMessages();
    expect(atEngine.map((m) => m.command)).toEqual(['initialize', 'attach', 'setBreakpoints', 'configurationDone']);
    expect(atEngine[1].arguments).toEqual({
      name: 'Maya',
      type: 'python',
      request: 'attach',
      connect: { host: 'localhost', port: 5678 },
      pathMappings: [{ localRoot: '/home/artist/tools', remoteRoot: '/home/artist/tools' }],
      program: PROGRAM,
    });

    // debugpy was injected through the command port first
    expect(hostConnector).toHaveBeenCalledWith({ host: '127.0.0.1', port: 7001 }, { timeoutMs: 500 });
    expect(engineConnector).toHaveBeenCalledWith({ host: 'localhost', port: 5678 }, { retryWindowMs: 0 });
    const injectionFile = path.join(tempDir, `maya-debug-relay-${process.pid}-1.py`);
    expect(hostSocket.writtenText()).toBe(formatExecCommand(injectionFile));
    expect(readFileSync(injectionFile, 'utf-8')).toContain('debugpy.listen(("localhost", 5678))');

    engineSocket.deliver(
      encodeFrame(JSON.stringify({ seq: 1, type: 'response', request_seq: 1, command: 'initialize', success: true }))
    );
    engineSocket.deliver(encodeFrame(JSON.stringify({ seq: 2, type: 'event', event: 'initialized' })));
    engineSocket.deliver(
      encodeFrame(JSON.stringify({ seq: 3, type: 'response', request_seq: 2, command: 'attach', success: true }))
    );
    engineSocket.deliver(
      encodeFrame(
        JSON.stringify({ seq: 4, type: 'response', request_seq: 4, command: 'configurationDone', success: true })
      )
    );

    await vi.waitFor(() => expect(toDebugger).toHaveLength(4));
    expect(toDebugger.map((m) => [m.type, m.command ?? m.event, m.request_seq])).toEqual([
      ['response', 'initialize', 1],
      ['event', 'initialized', undefined],
      ['response', 'attach', 2],
      ['response', 'configurationDone', 4],
    ]);

    // configurationDone sent the program to Maya
    const runFile = path.join(tempDir, `maya-debug-relay-${process.pid}-2.py`);
    await vi.waitFor(() => {
      expect(hostSocket.writtenText()).toBe(
        formatExecCommand(path.join(tempDir, `maya-debug-relay-${process.pid}-1.py`)) + formatExecCommand(runFile)
      );
    });
    expect(readFileSync(runFile, 'utf-8')).toBe(formatRunDirective(PROGRAM));

    input.end();
    await running;

    expect(terminate).toHaveBeenCalledTimes(1);
    expect(terminate).toHaveBeenCalledWith(0);
    expect(relay.session.engine.state).toBe('closed');
    expect(existsSync(injectionFile)).toBe(false);
    expect(existsSync(runFile)).toBe(false);
  });

  it('reports how to open the command port and exits when Maya is unreachable', async () => {
    hostConnector.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:7001'));
    const running = relay.run();

    input.write(request(1, 'initialize', { adapterID: 'python' }));
    input.write(request(2, 'attach', attachArguments));

    await vi.waitFor(() => expect(terminate).toHaveBeenCalledWith(1));

    expect(engineConnector).not.toHaveBeenCalled();
    expect(toDebugger).toEqual([
      expect.objectContaining({ type: 'response', command: 'initialize', request_seq: 1, success: true }),
      {
        seq: 2,
        type: 'event',
        event: 'output',
        body: {
          category: 'stderr',
          output: `${formatRemediation({ host: '127.0.0.1', port: 7001 })}\n`,
        },
      },
    ]);

    input.end();
    await running;
    expect(terminate).toHaveBeenCalledTimes(1);
  });

  it('keeps the debugger connection when debugpy cannot be reached', async () => {
    const failure = new Error('connect ECONNREFUSED 127.0.0.1:5678');
    engineConnector.mockRejectedValue(failure);
    const running = relay.run();

    input.write(request(2, 'attach', attachArguments));
    await vi.waitFor(() => expect(logger.error).toHaveBeenCalledWith('Attaching to Maya failed:', failure));

    expect(terminate).not.toHaveBeenCalled();
    expect(relay.session.engine.state).toBe('disconnected');

    input.end();
    await running;
    expect(terminate).toHaveBeenCalledWith(0);
  });

  it('shuts down with exit code 1 when the debugger stream cannot be decoded', async () => {
    const running = relay.run();
    input.write(request(2, 'attach', attachArguments));
    await vi.waitFor(() => expect(relay.session.engine.state).toBe('relaying'));

    input.write('Content-Length: abc\r\n\r\n');
    await running;

    expect(terminate).toHaveBeenCalledTimes(1);
    expect(terminate).toHaveBeenCalledWith(1);
    expect(logger.error).toHaveBeenCalledWith('Failure reading from the debugger:', expect.any(FramingError));
    expect(relay.session.engine.state).toBe('closed');
    expect(engineSocket.destroyed).toBe(true);
    expect(hostSocket.destroyed).toBe(true);
  });
});
