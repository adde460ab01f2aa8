import { execFile } from 'child_process';
import { createHash } from 'crypto';
import type { Platform, TrackDescriptor } from '@cadence/shared';
import { PlatformUnavailableError, TrackNotFoundError, isAbortError } from '../errors';
import { withRetry } from '../lib/retry';
import type { ResolvedPlaylist, ResolvedStream, TrackRequest, TrackResolver } from '../player/types';

// ---------------------------------------------------------------------------
// YtDlpResolver
//
// The production TrackResolver. Every lookup shells out to yt-dlp; nothing is
// downloaded here. FFmpeg opens the media URL itself later on.
//
// The query goes to execFile as an argument, never through a shell.
//
// Playlist URLs (YouTube /playlist?list=…, SoundCloud /sets/…) are expanded
// with --flat-playlist, which lists the entries without visiting each one.
// ---------------------------------------------------------------------------

const YOUTUBE_HOSTS = ['youtube.com', 'www.youtube.com', 'm.youtube.com', 'youtu.be', 'music.youtube.com'];
const SOUNDCLOUD_HOSTS = ['soundcloud.com', 'www.soundcloud.com', 'm.soundcloud.com'];

// Assumed bitrate when yt-dlp reports no size (live streams, some SoundCloud
// formats): 128 kbps, i.e. 16 000 bytes per second.
const FALLBACK_BYTES_PER_SECOND = 16_000;
const FALLBACK_SIZE_BYTES = 1024 * 1024;

// One tab-separated line per playlist entry. The title comes last so a title
// containing a tab survives.
const PLAYLIST_ENTRY_TEMPLATE = ['%(id)s', '%(duration)s', '%(url)s', '%(playlist_title)s', '%(title)s'].join('\t');

// Phrases in yt-dlp's stderr that mean the media does not exist (or is not
// viewable), as opposed to the platform being unreachable.
const NOT_FOUND_PATTERNS = [
  /video unavailable/i,
  /private video/i,
  /this video is not available/i,
  /has been removed/i,
  /does not exist/i,
  /unsupported url/i,
  /http error 404/i,
  /no video results/i,
];

export interface YtDlpResolverOptions {
  /** Path to the yt-dlp binary. */
  binary: string;
  /** Attempts per lookup for transient failures. */
  attempts?: number;
  retryDelayMs?: number;
}

export interface LookupTarget {
  /** What is handed to yt-dlp: a URL or an `ytsearch1:` style query. */
  input: string;
  platform: Platform;
}

// ---------------------------------------------------------------------------
// Pure helpers (exported for tests)
// ---------------------------------------------------------------------------

/**
 * Stable track id: SHA-1 of `platform:streamHandle`.
 */
export function trackId(platform: Platform, streamHandle: string): string {
  return createHash('sha1').update(`${platform}:${streamHandle}`).digest('hex');
}

export function detectPlatform(url: URL): Platform {
  if (YOUTUBE_HOSTS.includes(url.hostname)) return 'youtube';
  if (SOUNDCLOUD_HOSTS.includes(url.hostname)) return 'soundcloud';
  return 'direct';
}

export function isPlaylistUrl(url: URL): boolean {
  switch (detectPlatform(url)) {
    case 'youtube':
      return url.pathname === '/playlist' && url.searchParams.has('list');
    case 'soundcloud':
      return url.pathname.includes('/sets/');
    default:
      return false;
  }
}

/**
 * The lookup for a playlist query, or null when the query is not a playlist
 * URL.
 */
export function playlistTarget(request: TrackRequest): LookupTarget | null {
  const target = lookupTarget(request);
  if (target.platform === 'direct') return null;
  try {
    return isPlaylistUrl(new URL(target.input)) ? target : null;
  } catch {
    return null;
  }
}

/**
 * Decide what to ask yt-dlp for. URLs are looked up as-is; free text becomes
 * a single-result search on the hinted platform (YouTube by default).
 */
export function lookupTarget(request: TrackRequest): LookupTarget {
  const query = request.query.trim();

  let url: URL | null = null;
  try {
    url = new URL(query);
  } catch {
    url = null;
  }

  if (url && (url.protocol === 'http:' || url.protocol === 'https:')) {
    return { input: url.toString(), platform: detectPlatform(url) };
  }

  if (request.platformHint === 'soundcloud') {
    return { input: `scsearch1:${query}`, platform: 'soundcloud' };
  }
  return { input: `ytsearch1:${query}`, platform: 'youtube' };
}

/**
 * yt-dlp prints "NA" for fields a source does not have.
 */
function field(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed && trimmed !== 'NA' ? trimmed : null;
}

/**
 * Parse the output of `--print id --print duration --print webpage_url
 * --print thumbnail --print title`. The title comes last so a title with
 * newlines in it can be rebuilt from the remaining lines.
 */
export function parseMetadata(
  stdout: string,
  target: LookupTarget,
  requestedBy: string,
): TrackDescriptor | null {
  const lines = stdout.trimEnd().split('\n');
  if (lines.length < 5) return null;

  const id = field(lines[0]);
  const durationSeconds = Number.parseFloat(lines[1]);
  const pageUrl = field(lines[2]);
  const thumbnail = field(lines[3]);
  const title = lines.slice(4).join('\n').trim();
  if (!id && !pageUrl) return null;

  const streamHandle = pageUrl ?? target.input;
  return {
    id: trackId(target.platform, streamHandle),
    title: title || streamHandle,
    durationMs: Number.isFinite(durationSeconds) ? Math.round(durationSeconds * 1000) : 0,
    streamHandle,
    platform: target.platform,
    requestedBy,
    thumbnailUrl: thumbnail,
  };
}

/**
 * Parse `--flat-playlist` output printed with PLAYLIST_ENTRY_TEMPLATE. Lines
 * that carry no usable URL are skipped.
 */
export function parsePlaylist(stdout: string, target: LookupTarget, requestedBy: string): ResolvedPlaylist {
  const tracks: TrackDescriptor[] = [];
  let title: string | null = null;

  for (const line of stdout.split('\n')) {
    const parts = line.split('\t');
    if (parts.length < 5) continue;

    const id = field(parts[0]);
    const durationSeconds = Number.parseFloat(parts[1]);
    const url = field(parts[2]);
    title ??= field(parts[3]);
    const streamHandle =
      url ?? (target.platform === 'youtube' && id ? `https://www.youtube.com/watch?v=${id}` : null);
    if (!streamHandle) continue;

    tracks.push({
      id: trackId(target.platform, streamHandle),
      title: field(parts.slice(4).join('\t')) ?? streamHandle,
      durationMs: Number.isFinite(durationSeconds) ? Math.round(durationSeconds * 1000) : 0,
      streamHandle,
      platform: target.platform,
      requestedBy,
      thumbnailUrl: null,
    });
  }

  return { title: title ?? target.input, tracks };
}

/**
 * Parse the output of `--print filesize --print url` into a stream source.
 */
export function parseStream(stdout: string, track: TrackDescriptor, now = Date.now()): ResolvedStream | null {
  const lines = stdout.trim().split('\n');
  const url = field(lines[lines.length - 1]);
  if (!url) return null;

  const reported = lines.length > 1 ? Number.parseInt(lines[0], 10) : Number.NaN;
  return {
    url,
    sizeBytes: Number.isFinite(reported) && reported > 0 ? reported : estimateSize(track.durationMs),
    resolvedAt: now,
  };
}

export function estimateSize(durationMs: number): number {
  if (durationMs <= 0) return FALLBACK_SIZE_BYTES;
  return Math.ceil((durationMs / 1000) * FALLBACK_BYTES_PER_SECOND);
}

/**
 * Map a failed yt-dlp run onto the engine's resolve failures.
 */
export function classifyFailure(subject: string, message: string): TrackNotFoundError | PlatformUnavailableError {
  if (NOT_FOUND_PATTERNS.some((pattern) => pattern.test(message))) {
    return new TrackNotFoundError(`Nothing playable found for "${subject}".`);
  }
  return new PlatformUnavailableError(`yt-dlp lookup for "${subject}" failed: ${message}`);
}

// ---------------------------------------------------------------------------
// YtDlpResolver
// ---------------------------------------------------------------------------

export class YtDlpResolver implements TrackResolver {
  private readonly binary: string;
  private readonly attempts: number;
  private readonly retryDelayMs: number;

  constructor(options: YtDlpResolverOptions) {
    this.binary = options.binary;
    this.attempts = options.attempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
  }

  /**
   * Fetches title, duration and the canonical page URL by running:
   *   yt-dlp --no-playlist --print %(id)s --print %(duration)s
   *          --print %(webpage_url)s --print %(thumbnail)s --print %(title)s <input>
   *
   * --print outputs exactly one value per flag and exits without downloading
   * anything, far cheaper than --dump-json.
   */
  async resolve(request: TrackRequest): Promise<TrackDescriptor> {
    const target = lookupTarget(request);

    return withRetry(
      async () => {
        const stdout = await this.run(request.query, [
          '--no-playlist',
          '--print', '%(id)s',
          '--print', '%(duration)s',
          '--print', '%(webpage_url)s',
          '--print', '%(thumbnail)s',
          '--print', '%(title)s',
          target.input,
        ]);

        const track = parseMetadata(stdout, target, request.requestedBy);
        if (!track) {
          throw new TrackNotFoundError(`No results for "${request.query}".`);
        }
        return track;
      },
      {
        attempts: this.attempts,
        baseDelayMs: this.retryDelayMs,
        shouldRetry: (error) => error instanceof PlatformUnavailableError,
      },
    );
  }

  /**
   * Lists a playlist's entries without resolving each one:
   *   yt-dlp --flat-playlist --playlist-end <limit> --print <entry template> <url>
   */
  async resolvePlaylist(request: TrackRequest, limit: number): Promise<ResolvedPlaylist | null> {
    const target = playlistTarget(request);
    if (!target) return null;

    return withRetry(
      async () => {
        const stdout = await this.run(request.query, [
          '--flat-playlist',
          '--playlist-end', String(limit),
          '--print', PLAYLIST_ENTRY_TEMPLATE,
          target.input,
        ]);

        const playlist = parsePlaylist(stdout, target, request.requestedBy);
        if (playlist.tracks.length === 0) {
          throw new TrackNotFoundError(`No playable entries in playlist "${request.query}".`);
        }
        return playlist;
      },
      {
        attempts: this.attempts,
        baseDelayMs: this.retryDelayMs,
        shouldRetry: (error) => error instanceof PlatformUnavailableError,
      },
    );
  }

  /**
   * Asks yt-dlp for the direct media URL of the best audio-only format.
   * The URL is short-lived (YouTube's expire after a few hours), which is
   * why the stream cache entries carry a TTL.
   *
   * Key flags:
   *   -f bestaudio    Pick the best audio-only format available.
   *   --no-playlist   Only process the first video if given a playlist URL.
   */
  async resolveStream(track: TrackDescriptor, signal?: AbortSignal): Promise<ResolvedStream> {
    return withRetry(
      async () => {
        const stdout = await this.run(
          track.title,
          [
            '-f', 'bestaudio',
            '--no-playlist',
            '--print', '%(filesize,filesize_approx)s',
            '--print', '%(url)s',
            track.streamHandle,
          ],
          signal,
        );

        const stream = parseStream(stdout, track);
        if (!stream) {
          throw new PlatformUnavailableError(`yt-dlp printed no media URL for "${track.title}".`);
        }
        return stream;
      },
      {
        attempts: this.attempts,
        baseDelayMs: this.retryDelayMs,
        signal,
        shouldRetry: (error) => error instanceof PlatformUnavailableError,
      },
    );
  }

  private run(subject: string, args: string[], signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(this.binary, args, { encoding: 'utf8', signal, maxBuffer: 1024 * 1024 }, (error, stdout, stderr) => {
        if (error) {
          if (isAbortError(error)) return reject(error);
          if (Reflect.get(error, 'code') === 'ENOENT') {
            return reject(
              new PlatformUnavailableError(`yt-dlp is not installed (looked for "${this.binary}").`),
            );
          }
          return reject(classifyFailure(subject, stderr.trim() || error.message));
        }
        resolve(stdout);
      });
    });
  }
}
