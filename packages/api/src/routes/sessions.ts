import { Router } from 'express';
import type { Request } from 'express';
import { LOOP_MODES, PLATFORMS, TOGGLE_EFFECTS } from '@cadence/shared';
import type { LoopMode, Platform } from '@cadence/shared';
import { InvalidParameterError, isToggleEffect } from '@cadence/bot';
import type { EffectPatch, GuildSession, SessionRegistry } from '@cadence/bot';
import { requireAuth } from '../middleware/requireAuth';
import { requireAdmin } from '../middleware/requireAdmin';
import { asyncHandler, HttpError } from '../middleware/errorHandler';
import {
  integerParam,
  optionalBoolean,
  optionalInteger,
  optionalString,
  readBody,
  requireInteger,
  requireString,
} from '../lib/request';

const MAX_QUERY_LENGTH = 2000;

type MutableEffectPatch = { -readonly [K in keyof EffectPatch]: EffectPatch[K] };

function parsePlatform(raw: string | undefined): Platform | undefined {
  if (raw === undefined) return undefined;
  const platform = PLATFORMS.find((p) => p === raw);
  if (!platform) {
    throw new InvalidParameterError(
      `"platform" must be one of ${PLATFORMS.join(', ')} (got "${raw}").`,
    );
  }
  return platform;
}

function parseLoopMode(raw: string): LoopMode {
  const mode = LOOP_MODES.find((m) => m === raw);
  if (!mode) {
    throw new InvalidParameterError(
      `"mode" must be one of ${LOOP_MODES.join(', ')} (got "${raw}").`,
    );
  }
  return mode;
}

// ---------------------------------------------------------------------------
// createSessionsRouter
//
// The administrative surface over the engine, mounted at /api/sessions.
// Every route requires a valid session token; stop and leave also require
// admin. Engine errors thrown by an operation pass through asyncHandler to
// errorHandler, which maps them to their HTTP status.
// ---------------------------------------------------------------------------
export function createSessionsRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.use(requireAuth);

  /** The guild's live session, or a 404. */
  function sessionFor(req: Request): GuildSession {
    const { guildId } = req.params;
    const session = guildId ? registry.get(guildId) : undefined;
    if (!session || session.isClosed) {
      throw new HttpError(404, `No active session for guild ${guildId}.`, 'NotFound');
    }
    return session;
  }

  // -------------------------------------------------------------------------
  // GET /api/sessions
  //
  // Guild IDs with a live session.
  // -------------------------------------------------------------------------
  router.get('/', (_req, res) => {
    res.json({ guildIds: registry.listSessions() });
  });

  // -------------------------------------------------------------------------
  // GET /api/sessions/:guildId
  //
  // Snapshot of one session: status, playback state, position, queue and
  // effects.
  // -------------------------------------------------------------------------
  router.get('/:guildId', (req, res) => {
    const snapshot = registry.getSessionState(req.params.guildId);
    if (!snapshot) {
      throw new HttpError(404, `No active session for guild ${req.params.guildId}.`, 'NotFound');
    }
    res.json(snapshot);
  });

  // -------------------------------------------------------------------------
  // POST /api/sessions/:guildId/play
  //
  // Resolve a query and enqueue it; a playlist URL enqueues its entries.
  // Joins the voice channel if the guild has no session yet.
  //
  // Body:
  //   query       search terms or a URL
  //   platform?   "youtube" | "soundcloud" | "direct"
  //   channelId?  voice channel to join; defaults to the session's channel
  // -------------------------------------------------------------------------
  router.post(
    '/:guildId/play',
    asyncHandler(async (req, res) => {
      const body = readBody(req);
      const query = requireString(body, 'query');
      if (query.length > MAX_QUERY_LENGTH) {
        throw new InvalidParameterError(`"query" must be at most ${MAX_QUERY_LENGTH} characters.`);
      }
      const platformHint = parsePlatform(optionalString(body, 'platform'));

      const { guildId } = req.params;
      const channelId = optionalString(body, 'channelId') ?? registry.channelOf(guildId);
      if (!channelId) {
        throw new InvalidParameterError(
          '"channelId" is required when the bot is not in a voice channel.',
        );
      }

      const result = await registry.play({
        query,
        platformHint,
        requestedBy: req.user?.username ?? 'unknown',
        target: { guildId, channelId },
      });

      res.status(result.startedPlayback ? 201 : 200).json(result);
    }),
  );

  // -------------------------------------------------------------------------
  // Playback control
  // -------------------------------------------------------------------------
  router.post(
    '/:guildId/skip',
    asyncHandler(async (req, res) => {
      const next = await sessionFor(req).skip();
      res.json({ next });
    }),
  );

  router.post(
    '/:guildId/pause',
    asyncHandler(async (req, res) => {
      const session = sessionFor(req);
      await session.pause();
      res.json(session.snapshot());
    }),
  );

  router.post(
    '/:guildId/resume',
    asyncHandler(async (req, res) => {
      const session = sessionFor(req);
      await session.resume();
      res.json(session.snapshot());
    }),
  );

  // Body: { positionMs }
  router.post(
    '/:guildId/seek',
    asyncHandler(async (req, res) => {
      const session = sessionFor(req);
      await session.seek(requireInteger(readBody(req), 'positionMs'));
      res.json(session.snapshot());
    }),
  );

  router.post(
    '/:guildId/stop',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const session = sessionFor(req);
      await session.stop();
      res.json(session.snapshot());
    }),
  );

  // Tear the session down and disconnect. Responds with the final snapshot.
  router.post(
    '/:guildId/leave',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const snapshot = await registry.leave(req.params.guildId);
      if (!snapshot) {
        throw new HttpError(404, `No active session for guild ${req.params.guildId}.`, 'NotFound');
      }
      res.json(snapshot);
    }),
  );

  // -------------------------------------------------------------------------
  // Queue
  // -------------------------------------------------------------------------

  // Body: { mode: "off" | "track" | "queue" }
  router.post(
    '/:guildId/loop',
    asyncHandler(async (req, res) => {
      const mode = parseLoopMode(requireString(readBody(req), 'mode'));
      const loopMode = await sessionFor(req).setLoopMode(mode);
      res.json({ loopMode });
    }),
  );

  router.post(
    '/:guildId/shuffle',
    asyncHandler(async (req, res) => {
      const session = sessionFor(req);
      await session.shuffle();
      res.json(session.snapshot().queue);
    }),
  );

  // Body: { from, to }
  router.post(
    '/:guildId/queue/move',
    asyncHandler(async (req, res) => {
      const body = readBody(req);
      const session = sessionFor(req);
      await session.move(requireInteger(body, 'from'), requireInteger(body, 'to'));
      res.json(session.snapshot().queue);
    }),
  );

  router.delete(
    '/:guildId/queue/:index',
    asyncHandler(async (req, res) => {
      const removed = await sessionFor(req).removeAt(integerParam(req, 'index'));
      res.json({ removed });
    }),
  );

  // Drop everything after the current track.
  router.delete(
    '/:guildId/queue',
    asyncHandler(async (req, res) => {
      const removed = await sessionFor(req).clearUpcoming();
      res.json({ removed });
    }),
  );

  // -------------------------------------------------------------------------
  // Effects
  // -------------------------------------------------------------------------

  // Body: any of { bassBoostLevel, volume, karaoke, nightcore, threeD, echo }.
  // All fields are validated before any is applied.
  router.put(
    '/:guildId/effects',
    asyncHandler(async (req, res) => {
      const body = readBody(req);
      const patch: MutableEffectPatch = {};

      const bassBoostLevel = optionalInteger(body, 'bassBoostLevel');
      if (bassBoostLevel !== undefined) patch.bassBoostLevel = bassBoostLevel;

      const volume = optionalInteger(body, 'volume');
      if (volume !== undefined) patch.volume = volume;

      for (const name of TOGGLE_EFFECTS) {
        const enabled = optionalBoolean(body, name);
        if (enabled !== undefined) patch[name] = enabled;
      }

      if (Object.keys(patch).length === 0) {
        throw new InvalidParameterError('No effect fields given.');
      }

      const effects = await sessionFor(req).updateEffects(patch);
      res.json(effects);
    }),
  );

  router.post(
    '/:guildId/effects/:name/toggle',
    asyncHandler(async (req, res) => {
      const { name } = req.params;
      if (!isToggleEffect(name)) {
        throw new InvalidParameterError(
          `Unknown effect "${name}". Expected one of ${TOGGLE_EFFECTS.join(', ')}.`,
        );
      }
      const effects = await sessionFor(req).toggleEffect(name);
      res.json(effects);
    }),
  );

  // Presets replace every effect: gaming, movie (or cinema), party.
  router.post(
    '/:guildId/effects/presets/:name',
    asyncHandler(async (req, res) => {
      const effects = await sessionFor(req).applyPreset(req.params.name);
      res.json(effects);
    }),
  );

  router.delete(
    '/:guildId/effects',
    asyncHandler(async (req, res) => {
      const effects = await sessionFor(req).resetEffects();
      res.json(effects);
    }),
  );

  return router;
}
