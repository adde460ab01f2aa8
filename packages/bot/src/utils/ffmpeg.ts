import { spawn } from 'child_process';
import type { Readable } from 'stream';
import { opus } from 'prism-media';
import { OUTPUT_SAMPLE_RATE, renderFilterGraph } from '../player/effects';
import type { TranscodeRequest, TranscodeRun, Transcoder } from '../player/types';

// ---------------------------------------------------------------------------
// FfmpegTranscoder
//
// Spawns one FFmpeg process per pipeline run. FFmpeg opens the media URL
// itself (with HTTP reconnect flags), applies the effect filter graph and
// encodes Ogg/Opus; prism-media's OggDemuxer then splits stdout into raw
// Opus packets, one per 20 ms frame, which is what the voice transport
// sends.
//
// Key FFmpeg input flags:
//   -reconnect 1                  Reconnect after a dropped HTTP connection.
//   -reconnect_streamed 1         Also reconnect for live/streamed (chunked)
//                                 sources.
//   -reconnect_on_network_error 1 Reconnect on lower-level network/TLS errors.
//   -reconnect_delay_max 2        Cap reconnect back-off at 2 s.
//   -rw_timeout <us>              Fail a read that blocks this long, so a
//                                 dead source ends in a non-zero exit.
//   -ss <seconds>                 Input seek; used when a run restarts
//                                 mid-track (effects change, seek, reattach).
//
// Key FFmpeg output / encoding flags:
//   -af <graph>                   The rendered effect chain, when non-empty.
//   -ar 48000 -ac 2               Opus wants 48 kHz; Discord renders stereo.
//   -c:a libopus -b:a <n>k        Encode to Opus, Discord's native codec.
//   -application audio            Opus mode tuned for music.
//   -frame_duration 20            One Opus packet per 20 ms, which the
//                                 pipeline's position arithmetic relies on.
//   -f ogg                        Wrap in an OGG container for the demuxer.
//
// Exit handling: stdout is piped into the demuxer with { end: false }, and
// the demuxer is only ended once the process has exited cleanly. A non-zero
// exit becomes a stream error, so a dropped source never looks like a track
// that simply finished.
// ---------------------------------------------------------------------------

export interface FfmpegTranscoderOptions {
  binary: string;
  bitrateKbps: number;
  /** I/O timeout for the input, in milliseconds. */
  readTimeoutMs: number;
}

export function buildFfmpegArgs(
  request: TranscodeRequest,
  { bitrateKbps, readTimeoutMs }: Pick<FfmpegTranscoderOptions, 'bitrateKbps' | 'readTimeoutMs'>,
): string[] {
  const args = [
    // ---- Input / HTTP options (must come before -i) ---------------------
    '-reconnect',                  '1',
    '-reconnect_streamed',         '1',
    '-reconnect_on_network_error', '1',
    '-reconnect_delay_max',        '2',
    '-rw_timeout',                 String(readTimeoutMs * 1000),
  ];
  if (request.seekMs > 0) {
    args.push('-ss', (request.seekMs / 1000).toFixed(3));
  }
  args.push(
    '-i',                          request.source.url,
    // ---- Demux / logging ------------------------------------------------
    '-analyzeduration',            '0',
    '-loglevel',                   'warning',
    '-vn',
  );

  const filters = renderFilterGraph(request.filters);
  if (filters) {
    args.push('-af', filters);
  }

  args.push(
    // ---- Output encoding ------------------------------------------------
    '-ar',                         String(OUTPUT_SAMPLE_RATE),
    '-ac',                         '2',
    '-c:a',                        'libopus',
    '-b:a',                        `${bitrateKbps}k`,
    '-application',                'audio',
    '-frame_duration',             '20',
    '-f',                          'ogg',
    'pipe:1',
  );
  return args;
}

/**
 * Yields only Buffer chunks; the demuxer emits nothing else, but its stream
 * typings say `any`.
 */
async function* opusPackets(stream: Readable): AsyncGenerator<Buffer> {
  for await (const chunk of stream) {
    if (Buffer.isBuffer(chunk)) yield chunk;
  }
}

export class FfmpegTranscoder implements Transcoder {
  private readonly binary: string;
  private readonly bitrateKbps: number;
  private readonly readTimeoutMs: number;

  constructor(options: FfmpegTranscoderOptions) {
    this.binary = options.binary;
    this.bitrateKbps = options.bitrateKbps;
    this.readTimeoutMs = options.readTimeoutMs;
  }

  open(request: TranscodeRequest): TranscodeRun {
    const args = buildFfmpegArgs(request, {
      bitrateKbps: this.bitrateKbps,
      readTimeoutMs: this.readTimeoutMs,
    });
    const ffmpeg = spawn(this.binary, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    const demuxer = new opus.OggDemuxer();
    let killed = false;

    // Surface FFmpeg warnings/errors in the bot console without letting them
    // propagate as unhandled stream errors.
    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      const msg = chunk.toString().trim();
      if (msg) console.warn('[FFmpeg]', msg);
    });

    // Spawn failures (binary missing, EACCES) arrive here, not on stdout.
    ffmpeg.on('error', (err) => {
      console.error('[FFmpeg] process error:', err.message);
      demuxer.destroy(err);
    });

    ffmpeg.on('close', (code, signal) => {
      if (killed) return;
      if (code === 0) {
        demuxer.end();
      } else {
        demuxer.destroy(new Error(`FFmpeg exited with ${code === null ? `signal ${signal}` : `code ${code}`}.`));
      }
    });

    ffmpeg.stdout.pipe(demuxer, { end: false });

    const kill = (reason?: Error) => {
      if (killed) return;
      killed = true;
      ffmpeg.stdout.unpipe(demuxer);
      ffmpeg.kill();
      demuxer.destroy(reason);
    };

    return { frames: opusPackets(demuxer), kill };
  }
}
