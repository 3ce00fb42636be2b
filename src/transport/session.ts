/**
 * Transport Session
 *
 * Owns one child process and moves discrete JSON-RPC messages across its
 * stdio:
 * - stdin carries outgoing messages, one JSON object per line
 * - stdout is framed into lines and parsed in the background
 * - stderr is surfaced line by line as diagnostics, never parsed
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { ulid } from 'ulid';
import {
  describeError,
  LaunchError,
  ParseError,
  WriteError,
} from '../rpc/errors.js';
import { isMessage, type JsonRpcMessage } from '../rpc/types.js';
import { errors } from '../strings/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { encodeLine, LineFramer } from './framing.js';
import type { EndOfStream, MessageTransport, SessionState } from './types.js';

/** Time between SIGTERM and SIGKILL during stop() */
export const DEFAULT_KILL_GRACE_MS = 3000;

/** How long output may keep flowing after the child has exited */
export const DEFAULT_EXIT_DRAIN_MS = 250;

/**
 * Options for TransportSession
 */
export interface TransportSessionOptions {
  /** Executable to launch */
  command: string;
  args?: string[];
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  cwd?: string;
  /** Grace period before a forced kill in milliseconds (default: 3000) */
  killGraceMs?: number;
  /**
   * After the child exits, wait this long for its stdio to close before
   * closing it ourselves. A grandchild that inherited the pipes keeps them
   * open otherwise. (default: 250)
   */
  exitDrainMs?: number;
  logger?: Logger;
}

export class TransportSession extends EventEmitter implements MessageTransport {
  readonly id = ulid();
  readonly command: string;
  readonly args: string[];

  private currentState: SessionState = 'not_started';
  private child: ChildProcessWithoutNullStreams | null = null;
  private readonly env?: Record<string, string>;
  private readonly cwd?: string;
  private readonly killGraceMs: number;
  private readonly exitDrainMs: number;
  private readonly logger: Logger;
  private readonly framer = new LineFramer();
  private readonly stderrFramer = new LineFramer();
  private stopRequested = false;
  private stopping: Promise<void> | null = null;
  private launchFailed = false;
  private ended = false;
  private drainTimer: NodeJS.Timeout | null = null;
  private resolveClosed: () => void = () => {};
  private readonly closed: Promise<void>;

  constructor(options: TransportSessionOptions) {
    super();
    this.command = options.command;
    this.args = options.args ?? [];
    this.env = options.env;
    this.cwd = options.cwd;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.exitDrainMs = options.exitDrainMs ?? DEFAULT_EXIT_DRAIN_MS;
    this.logger = (options.logger ?? createLogger('transport')).child(this.id.slice(-6));
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  /**
   * Launch the child process and begin reading its output.
   *
   * @throws LaunchError if the executable cannot be spawned, or the session
   *   was already started
   */
  start(): Promise<void> {
    if (this.currentState !== 'not_started') {
      return Promise.reject(
        new LaunchError(errors.transport.alreadyStarted(this.currentState), this.command),
      );
    }

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(this.command, this.args, {
        cwd: this.cwd,
        env: { ...process.env, ...this.env },
      });
    } catch (err) {
      this.currentState = 'closed';
      this.launchFailed = true;
      this.resolveClosed();
      return Promise.reject(
        new LaunchError(
          errors.transport.spawnFailed(this.command, describeError(err)),
          this.command,
          { cause: err },
        ),
      );
    }

    this.child = child;
    this.attachStreams(child);

    return new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onLaunchError);
        child.on('error', (err) => {
          this.logger.error(`Child process error: ${err.message}`);
        });
        if (this.currentState === 'not_started') {
          this.currentState = 'running';
        }
        this.logger.debug(`Started ${this.command} (pid ${child.pid})`);
        resolve();
      };

      const onLaunchError = (err: NodeJS.ErrnoException): void => {
        child.off('spawn', onSpawn);
        this.launchFailed = true;
        this.currentState = 'closed';
        this.child = null;
        this.resolveClosed();
        const message =
          err.code === 'ENOENT'
            ? errors.transport.commandNotFound(this.command)
            : errors.transport.spawnFailed(this.command, err.message);
        reject(new LaunchError(message, this.command, { cause: err }));
      };

      child.once('spawn', onSpawn);
      child.once('error', onLaunchError);
    });
  }

  /**
   * Write one message as a single line. Resolves once the chunk has been
   * handed to the pipe, so sequential sends keep their order on the wire.
   *
   * @throws WriteError if the session is not running or the pipe is closed
   */
  send(message: JsonRpcMessage): Promise<void> {
    const child = this.child;
    if (this.currentState !== 'running' || !child) {
      return Promise.reject(new WriteError(errors.transport.notRunning(this.currentState)));
    }

    const stdin = child.stdin;
    if (stdin.destroyed || stdin.writableEnded) {
      return Promise.reject(new WriteError(errors.transport.stdinClosed));
    }

    let line: string;
    try {
      line = encodeLine(message);
    } catch (err) {
      return Promise.reject(
        new WriteError(errors.transport.writeFailed(describeError(err)), { cause: err }),
      );
    }

    return new Promise<void>((resolve, reject) => {
      stdin.write(line, (err) => {
        if (err) {
          reject(new WriteError(errors.transport.writeFailed(err.message), { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Terminate the child: end stdin, SIGTERM, then SIGKILL after the grace
   * period. Once the grace period is over the pipes are closed even if
   * something else still holds them. Resolves once 'end' has been emitted.
   * Repeated calls return the same promise.
   */
  stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }
    this.stopRequested = true;

    const child = this.child;
    if (!child || this.currentState === 'closed') {
      this.currentState = 'closed';
      this.resolveClosed();
      this.stopping = Promise.resolve();
      return this.stopping;
    }

    this.stopping = this.terminate(child);
    return this.stopping;
  }

  private async terminate(child: ChildProcessWithoutNullStreams): Promise<void> {
    this.currentState = 'closing';
    this.logger.debug('Stopping child process');

    child.stdin.end();
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
    }

    const forceKill = setTimeout(() => {
      if (child.exitCode === null && child.signalCode === null) {
        this.logger.warn(`Child did not exit within ${this.killGraceMs}ms, sending SIGKILL`);
        child.kill('SIGKILL');
      } else {
        this.closeStreams(child, child.exitCode, child.signalCode);
      }
    }, this.killGraceMs);

    try {
      await this.closed;
    } finally {
      clearTimeout(forceKill);
    }
  }

  private attachStreams(child: ChildProcessWithoutNullStreams): void {
    child.stdout.on('data', (chunk: Buffer) => {
      for (const line of this.framer.push(chunk)) {
        this.handleLine(line);
      }
    });

    child.stderr.on('data', (chunk: Buffer) => {
      for (const line of this.stderrFramer.push(chunk)) {
        this.handleStderr(line);
      }
    });

    // EPIPE after the child exits surfaces here; send() reports it to the caller
    child.stdin.on('error', (err) => {
      this.logger.debug(`stdin error: ${err.message}`);
    });

    child.on('exit', (code, signal) => {
      if (this.currentState === 'running') {
        this.currentState = 'closing';
        this.logger.warn(
          `Child exited unexpectedly (code: ${code ?? 'none'}, signal: ${signal ?? 'none'})`,
        );
      }
      this.drainTimer = setTimeout(() => {
        this.drainTimer = null;
        this.closeStreams(child, code, signal);
      }, this.exitDrainMs);
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      this.handleClose(code, signal);
    });
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }
    this.logger.debug(`<- ${trimmed}`);

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      this.emit(
        'parseError',
        new ParseError(errors.protocol.invalidJson(describeError(err)), trimmed, { cause: err }),
      );
      return;
    }

    if (!isMessage(parsed)) {
      this.emit(
        'parseError',
        new ParseError(errors.protocol.notJsonRpc, trimmed, { payload: parsed }),
      );
      return;
    }

    this.emit('message', parsed);
  }

  private handleStderr(line: string): void {
    const trimmed = line.trimEnd();
    if (!trimmed) {
      return;
    }
    this.logger.debug(`stderr: ${trimmed}`);
    this.emit('stderr', trimmed);
  }

  /**
   * The child is gone but its pipes are still open, so another process
   * inherited them. Drop them and end the session now.
   */
  private closeStreams(
    child: ChildProcessWithoutNullStreams,
    code: number | null,
    signal: NodeJS.Signals | null,
  ): void {
    if (this.ended) {
      return;
    }
    this.logger.debug('Child exited but its stdio is still open; closing it');
    child.stdin.destroy();
    child.stdout.destroy();
    child.stderr.destroy();
    this.handleClose(code, signal);
  }

  private handleClose(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.launchFailed || this.ended) {
      return;
    }
    this.ended = true;
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }

    const rest = this.framer.end();
    if (rest !== null) {
      this.handleLine(rest);
    }
    const stderrRest = this.stderrFramer.end();
    if (stderrRest !== null) {
      this.handleStderr(stderrRest);
    }

    this.currentState = 'closed';
    const info: EndOfStream = { code, signal, expected: this.stopRequested };
    this.logger.debug(`Stream closed (code: ${code ?? 'none'}, signal: ${signal ?? 'none'})`);
    this.emit('end', info);
    this.resolveClosed();
  }
}
