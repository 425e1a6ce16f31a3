import ffmpeg from 'fluent-ffmpeg';
import { PassThrough, type Readable } from 'node:stream';
import loggerModule, { type Logger } from '../logger.js';
import metrics from '../metrics/index.js';
import { ConfigurationError } from '../errors.js';
import type { CameraConfig } from '../config/index.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_FRAME_TIMEOUT_MS = 5000;
const DEFAULT_RESTART_DELAY_MS = 1000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;
const DEFAULT_MAX_QUEUED_FRAMES = 2;

export type CameraInput = {
  input: string;
  format?: string;
  inputArgs: string[];
};

export type FrameCommandOptions = CameraInput & {
  framesPerSecond: number;
  width?: number;
};

/** A running capture process writing concatenated PNG images. */
export interface FrameCommand {
  readonly frames: Readable;
  kill(signal: NodeJS.Signals): void;
  onExit(listener: (error: Error | null) => void): void;
}

export type CameraSourceOptions = FrameCommandOptions & {
  frameTimeoutMs?: number;
  restartDelayMs?: number;
  forceKillTimeoutMs?: number;
  maxBufferBytes?: number;
  maxQueuedFrames?: number;
  ffmpegPath?: string;
  commandFactory?: (options: FrameCommandOptions) => FrameCommand;
  now?: () => number;
  logger?: Logger;
};

type FrameWaiter = (frame: Buffer | null) => void;

export function resolveCameraInput(
  camera: Pick<CameraConfig, 'deviceIndex' | 'input' | 'format' | 'inputArgs'>,
  platform: NodeJS.Platform = process.platform
): CameraInput {
  const inputArgs = camera.inputArgs ?? [];
  if (camera.input) {
    return { input: camera.input, format: camera.format, inputArgs };
  }

  if (platform === 'linux') {
    return { input: `/dev/video${camera.deviceIndex}`, format: camera.format ?? 'v4l2', inputArgs };
  }

  if (platform === 'darwin') {
    return { input: `${camera.deviceIndex}`, format: camera.format ?? 'avfoundation', inputArgs };
  }

  throw new ConfigurationError(
    `Camera device index cannot be mapped to an input on ${platform}; set camera.input`
  );
}

export function createFfmpegCommand(options: FrameCommandOptions): FrameCommand {
  const command = ffmpeg(options.input);

  const inputOptions: string[] = [];
  if (options.format) {
    inputOptions.push('-f', options.format);
  }
  if (options.inputArgs.length > 0) {
    inputOptions.push(...options.inputArgs);
  }
  if (inputOptions.length > 0) {
    command.inputOptions(inputOptions);
  }

  const filters = [`fps=${options.framesPerSecond}`];
  if (options.width) {
    filters.push(`scale=${options.width}:-2`);
  }

  command
    .outputOptions('-vf', filters.join(','))
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');

  const frames = new PassThrough();
  command.pipe(frames, { end: true });

  return {
    frames,
    kill(signal) {
      command.kill(signal);
    },
    onExit(listener) {
      let settled = false;
      command.once('error', (error: Error) => {
        if (!settled) {
          settled = true;
          listener(error);
        }
      });
      command.once('end', () => {
        if (!settled) {
          settled = true;
          listener(null);
        }
      });
    }
  };
}

/**
 * Pull-style wrapper around a continuous ffmpeg capture. Frames that arrive
 * while nobody is asking are queued up to a small limit, oldest dropped
 * first.
 */
export class CameraSource {
  private command: FrameCommand | null = null;
  private commandExit: Promise<void> | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private readonly queue: Buffer[] = [];
  private readonly waiters = new Set<FrameWaiter>();
  private lastExitAt: number | null = null;
  private closed = false;
  private closePromise: Promise<void> | null = null;
  private readonly commandFactory: (options: FrameCommandOptions) => FrameCommand;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: CameraSourceOptions) {
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
    }
    this.commandFactory = options.commandFactory ?? createFfmpegCommand;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? loggerModule;
  }

  isRunning() {
    return this.command !== null;
  }

  /** Resolves with the next PNG frame, or null when none arrived in time. */
  async captureFrame(): Promise<Buffer | null> {
    if (this.closed) {
      return null;
    }

    const queued = this.queue.shift();
    if (queued) {
      return queued;
    }

    if (!this.command && !this.tryStart()) {
      return null;
    }

    const timeoutMs = this.options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS;
    return new Promise<Buffer | null>(resolve => {
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        resolve(null);
      }, timeoutMs);
      const waiter: FrameWaiter = frame => {
        clearTimeout(timer);
        this.waiters.delete(waiter);
        resolve(frame);
      };
      this.waiters.add(waiter);
    });
  }

  close(): Promise<void> {
    if (!this.closePromise) {
      this.closed = true;
      this.flushWaiters();
      this.queue.length = 0;
      this.closePromise = this.terminateCommand();
    }
    return this.closePromise;
  }

  private tryStart(): boolean {
    const restartDelayMs = this.options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    if (this.lastExitAt !== null && this.now() - this.lastExitAt < restartDelayMs) {
      return false;
    }

    let command: FrameCommand;
    try {
      command = this.commandFactory({
        input: this.options.input,
        format: this.options.format,
        inputArgs: this.options.inputArgs,
        framesPerSecond: this.options.framesPerSecond,
        width: this.options.width
      });
    } catch (error) {
      this.lastExitAt = this.now();
      this.recordFailure('start-error', error);
      return false;
    }

    this.command = command;
    this.commandExit = new Promise<void>(resolve => {
      command.onExit(error => {
        this.handleExit(command, error);
        resolve();
      });
    });
    this.consume(command.frames);
    this.logger.debug({ input: this.options.input }, 'Camera capture started');
    return true;
  }

  private consume(stream: Readable) {
    this.buffer = Buffer.alloc(0);

    const onData = (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = this.extractFrames(this.buffer);
      this.buffer = remainder;

      for (const frame of frames) {
        this.deliver(frame);
      }

      if (corrupted) {
        this.buffer = Buffer.alloc(0);
        this.recordFailure('corrupted-frame', new Error('Corrupted frame encountered'));
      }
    };

    const onError = (error: Error) => {
      this.recordFailure('stream-error', error);
    };

    stream.on('data', onData);
    stream.on('error', onError);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      if (!stream.destroyed) {
        stream.destroy();
      }
    };
  }

  private deliver(frame: Buffer) {
    const [waiter] = this.waiters;
    if (waiter) {
      waiter(frame);
      return;
    }
    this.queue.push(frame);
    const limit = this.options.maxQueuedFrames ?? DEFAULT_MAX_QUEUED_FRAMES;
    while (this.queue.length > limit) {
      this.queue.shift();
    }
  }

  private handleExit(command: FrameCommand, error: Error | null) {
    if (this.command !== command) {
      return;
    }
    this.command = null;
    this.streamCleanup?.();
    this.streamCleanup = null;
    this.buffer = Buffer.alloc(0);
    this.lastExitAt = this.now();
    this.flushWaiters();

    if (this.closed) {
      return;
    }
    this.recordFailure(error ? 'ffmpeg-error' : 'ffmpeg-ended', error);
  }

  private recordFailure(reason: string, error: unknown) {
    metrics.incrementDetectorCounter('camera', reason, 1);
    this.logger.warn({ err: error, reason, input: this.options.input }, 'Camera capture interrupted');
  }

  private flushWaiters() {
    for (const waiter of [...this.waiters]) {
      waiter(null);
    }
  }

  private async terminateCommand() {
    const command = this.command;
    const exit = this.commandExit;
    if (!command || !exit) {
      return;
    }

    command.kill('SIGTERM');
    const forceKillTimeoutMs = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    const killTimer = setTimeout(() => {
      command.kill('SIGKILL');
    }, forceKillTimeoutMs);
    killTimer.unref();

    try {
      await exit;
    } finally {
      clearTimeout(killTimer);
    }
    this.logger.debug({ input: this.options.input }, 'Camera capture stopped');
  }

  private extractFrames(buffer: Buffer) {
    let working = buffer;
    const frames: Buffer[] = [];
    let corrupted = false;
    const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    while (true) {
      const pngStart = working.indexOf(PNG_SIGNATURE);

      if (pngStart === -1) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      if (pngStart > 0) {
        working = working.subarray(pngStart);
      }

      const frame = slicePng(working);
      if (!frame) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      frames.push(frame.png);
      working = frame.remainder;
    }

    return { frames, remainder: working, corrupted };
  }
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}
