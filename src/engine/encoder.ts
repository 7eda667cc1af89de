import { spawn } from "child_process";
import { mkdir, rm } from "fs/promises";
import { dirname } from "path";
import type { Writable } from "stream";
import type { RasterImage } from "../core/types.js";
import { EncodingError } from "../core/errors.js";

// ── Types ───────────────────────────────────────────────────────────

export interface EncoderOptions {
  /** ffmpeg binary, resolved through PATH when not absolute */
  ffmpegPath?: string;
  /** libx264 preset */
  preset?: string;
  crf?: number;
}

export interface EncodeRequest {
  outputPath: string;
  fps: number;
  /** Frame count the caller planned for; a shortfall is reported as a warning */
  expectedFrames?: number;
}

export interface EncodeResult {
  outputPath: string;
  frames: number;
  warnings: string[];
}

export interface FrameEncoder {
  encode(frames: readonly RasterImage[], req: EncodeRequest): Promise<EncodeResult>;
}

type ExitStatus =
  | { kind: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "error"; error: Error };

const STDERR_TAIL_BYTES = 2048;

// ── ffmpeg arguments ────────────────────────────────────────────────

export function ffmpegArgs(
  width: number,
  height: number,
  fps: number,
  outputPath: string,
  opts: { preset: string; crf: number },
): string[] {
  const args = [
    "-y",
    "-f", "rawvideo",
    "-pix_fmt", "rgba",
    "-s", `${width}x${height}`,
    "-r", String(fps),
    "-i", "pipe:0",
    "-an",
    "-c:v", "libx264",
    "-preset", opts.preset,
    "-crf", String(opts.crf),
    "-pix_fmt", "yuv420p",
    "-movflags", "+faststart",
  ];
  // yuv420p needs even dimensions
  if (width % 2 !== 0 || height % 2 !== 0) {
    args.push("-vf", "pad=ceil(iw/2)*2:ceil(ih/2)*2");
  }
  args.push(outputPath);
  return args;
}

// Resolves on drain, or when the stream errors or closes
function drained(stream: Writable): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      stream.off("drain", done);
      stream.off("error", done);
      stream.off("close", done);
      resolve();
    };
    stream.on("drain", done);
    stream.on("error", done);
    stream.on("close", done);
  });
}

function lastLine(text: string): string {
  const lines = text.split("\n").map((l) => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? "";
}

// ── Encoder ─────────────────────────────────────────────────────────

export class VideoEncoder implements FrameEncoder {
  private readonly ffmpegPath: string;
  private readonly preset: string;
  private readonly crf: number;

  constructor(opts: EncoderOptions = {}) {
    this.ffmpegPath = opts.ffmpegPath ?? "ffmpeg";
    this.preset = opts.preset ?? "medium";
    this.crf = opts.crf ?? 23;
  }

  /**
   * Pipes raw RGBA frames into ffmpeg and writes an H.264 MP4. On any
   * failure the partial output is removed before EncodingError is thrown.
   */
  async encode(frames: readonly RasterImage[], req: EncodeRequest): Promise<EncodeResult> {
    const { outputPath, fps } = req;
    if (frames.length === 0) {
      throw new EncodingError(outputPath, "No frames to encode");
    }

    const { width, height } = frames[0];
    frames.forEach((frame, i) => {
      if (frame.width !== width || frame.height !== height || frame.data.length !== width * height * 4) {
        throw new EncodingError(
          outputPath,
          `Frame ${i} is ${frame.width}x${frame.height} (${frame.data.length} bytes), expected ${width}x${height} RGBA`,
        );
      }
    });

    const warnings: string[] = [];
    if (req.expectedFrames !== undefined && frames.length < req.expectedFrames) {
      warnings.push(`Encoding ${frames.length} of ${req.expectedFrames} planned frames`);
    }

    await mkdir(dirname(outputPath), { recursive: true });

    const child = spawn(
      this.ffmpegPath,
      ffmpegArgs(width, height, fps, outputPath, { preset: this.preset, crf: this.crf }),
      { stdio: ["pipe", "ignore", "pipe"] },
    );

    const state: { stderr: string; stdinError: Error | null; finished: boolean } = {
      stderr: "",
      stdinError: null,
      finished: false,
    };

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      state.stderr = (state.stderr + chunk).slice(-STDERR_TAIL_BYTES);
    });
    child.stdin.on("error", (e: Error) => {
      state.stdinError = e;
    });

    const exited = new Promise<ExitStatus>((resolve) => {
      child.once("error", (error) => resolve({ kind: "error", error }));
      child.once("close", (code, signal) => resolve({ kind: "exit", code, signal }));
    }).then((status) => {
      state.finished = true;
      return status;
    });

    for (const frame of frames) {
      if (state.finished || state.stdinError) break;
      if (!child.stdin.write(frame.data)) {
        await Promise.race([drained(child.stdin), exited]);
      }
    }
    child.stdin.end();

    const status = await exited;
    const failure = this.describeFailure(status, state.stdinError, state.stderr);
    if (failure) {
      await rm(outputPath, { force: true });
      throw new EncodingError(outputPath, failure.message, {
        exitCode: status.kind === "exit" ? status.code : null,
        stderr: state.stderr,
        cause: failure.cause,
      });
    }

    return { outputPath, frames: frames.length, warnings };
  }

  private describeFailure(
    status: ExitStatus,
    stdinError: Error | null,
    stderr: string,
  ): { message: string; cause: unknown } | null {
    if (status.kind === "error") {
      return { message: `Could not run ${this.ffmpegPath}: ${status.error.message}`, cause: status.error };
    }
    if (status.code !== 0) {
      const detail = status.code === null ? `was killed by ${status.signal ?? "a signal"}` : `exited with code ${status.code}`;
      const reason = lastLine(stderr);
      return { message: reason ? `ffmpeg ${detail}: ${reason}` : `ffmpeg ${detail}`, cause: stdinError ?? undefined };
    }
    if (stdinError) {
      return { message: `ffmpeg stopped reading frames: ${stdinError.message}`, cause: stdinError };
    }
    return null;
  }
}
