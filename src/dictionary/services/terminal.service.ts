import { Inject, Injectable, Optional } from '@nestjs/common';
import { createInterface, Interface } from 'readline';
import { Writable } from 'stream';

import { InputClosedError, UserCancellationError } from '../errors/dictionary.errors';

/**
 * Everything the shell says to, or hears from, the user. Console notices such
 * as "Connected successfully." are part of the transcript and go through here
 * rather than the Nest logger.
 */
export abstract class Terminal {
  abstract open(): void;
  abstract ask(question: string): Promise<string>;
  abstract askHidden(question: string): Promise<string>;
  abstract print(message: string): void;
  abstract throwIfCancelled(): void;
  abstract close(): void;
}

export const TERMINAL_STREAMS = Symbol('TERMINAL_STREAMS');

export interface TerminalStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
  // Source of out-of-band SIGINT when input is piped rather than a TTY.
  signals: NodeJS.EventEmitter;
  terminal?: boolean;
}

interface PendingAnswer {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

@Injectable()
export class ReadlineTerminal extends Terminal {
  private readonly streams: TerminalStreams;
  private rl: Interface | null = null;
  private muted = false;
  private inputClosed = false;
  private readonly interrupt = new AbortController();
  // Lines that arrived while no prompt was waiting, e.g. piped or typed ahead.
  private readonly buffered: string[] = [];
  private pending: PendingAnswer | null = null;

  constructor(@Optional() @Inject(TERMINAL_STREAMS) streams?: TerminalStreams) {
    super();
    this.streams = streams ?? { input: process.stdin, output: process.stdout, signals: process };
  }

  private readonly onLine = (line: string) => {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
      return;
    }
    this.buffered.push(line);
  };

  private readonly onInterrupt = () => {
    const cancellation = new UserCancellationError();
    this.interrupt.abort(cancellation);
    this.settlePending(cancellation);
  };

  private readonly onInputClosed = () => {
    this.inputClosed = true;
    this.settlePending(new InputClosedError());
  };

  open(): void {
    if (this.rl) {
      return;
    }

    const { input, output: target, signals } = this.streams;
    const output = new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        if (!this.muted) {
          target.write(chunk);
        }
        callback();
      },
    });

    this.rl = createInterface({
      input,
      output,
      terminal: this.streams.terminal ?? input.isTTY === true,
    });
    this.rl.on('line', this.onLine);
    this.rl.on('SIGINT', this.onInterrupt);
    this.rl.on('close', this.onInputClosed);
    signals.on('SIGINT', this.onInterrupt);
  }

  ask(question: string): Promise<string> {
    const rl = this.rl;
    if (!rl) {
      return Promise.reject(new Error('Terminal is not open'));
    }
    if (this.interrupt.signal.aborted) {
      return Promise.reject(new UserCancellationError());
    }

    if (this.inputClosed) {
      this.streams.output.write(question);
    } else {
      rl.setPrompt(question);
      rl.prompt();
    }

    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.inputClosed) {
      return Promise.reject(new InputClosedError());
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  async askHidden(question: string): Promise<string> {
    this.streams.output.write(question);
    this.muted = true;
    try {
      return await this.ask('');
    } finally {
      this.muted = false;
      this.streams.output.write('\n');
    }
  }

  print(message: string): void {
    this.streams.output.write(`${message}\n`);
  }

  throwIfCancelled(): void {
    this.interrupt.signal.throwIfAborted();
  }

  close(): void {
    this.streams.signals.off('SIGINT', this.onInterrupt);
    if (this.rl) {
      this.rl.off('line', this.onLine);
      this.rl.off('SIGINT', this.onInterrupt);
      this.rl.off('close', this.onInputClosed);
      this.rl.close();
      this.rl = null;
    }
  }

  private settlePending(error: Error): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(error);
    }
  }
}
