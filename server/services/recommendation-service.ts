/**
 * Recommendation resolver
 * server/services/recommendation-service.ts
 *
 * Resolves a follow-up activity for a (learning style, mood) pair.
 * Fallback chain, first hit wins:
 *   exact (style + mood) → style default → mood default → seeded random → none
 *
 * The resolver itself is pure; callers load the course's recommendation table
 * and activity list and pass them in.
 */

import { createHash } from 'crypto';
import type { Activity, CourseRecommendation, RecommendationEntry } from '@shared/schema';
import type { IStorage } from '../storage';
import { NotFoundError, ValidationError } from '../errors';

// ── Types ────────────────────────────────────────────────────────

export type MatchType = 'style+mood' | 'style-default' | 'mood-default' | 'random' | 'none';

export interface RecommendationTable {
  recommendations: CourseRecommendation[];
  activities: Activity[];
}

export interface ResolveInput {
  courseId: string;
  learningStyle: string | null;
  // Assumed validated against the course's mood labels
  mood: string;
  participantKey: string;
  // YYYY-MM-DD of the session start
  sessionDate: string;
}

export interface RecommendationMatch {
  matchType: MatchType;
  activityId: string | null;
}

export interface RecommendationPayload {
  matchType: MatchType;
  learningStyle: string | null;
  mood: string;
  activity: {
    activityId: string;
    name: string;
    summary: string;
    type: string;
    content: Record<string, unknown>;
  } | null;
}

type ResolverStrategy =
  | { kind: 'exact' }
  | { kind: 'style-default' }
  | { kind: 'mood-default' }
  | { kind: 'random' };

const STRATEGIES: readonly ResolverStrategy[] = [
  { kind: 'exact' },
  { kind: 'style-default' },
  { kind: 'mood-default' },
  { kind: 'random' },
];

const MATCH_TYPES: Record<ResolverStrategy['kind'], MatchType> = {
  'exact': 'style+mood',
  'style-default': 'style-default',
  'mood-default': 'mood-default',
  'random': 'random',
};

// ── Strategies ───────────────────────────────────────────────────

function findEntry(
  table: RecommendationTable,
  predicate: (row: CourseRecommendation) => boolean,
): string | null {
  // rows are newest first; an entry whose activity is gone does not match
  const known = new Set(table.activities.map(activity => activity.id));
  const row = table.recommendations.find(candidate => predicate(candidate) && known.has(candidate.activityId));
  return row ? row.activityId : null;
}

export function seededIndex(seedParts: string[], size: number): number {
  const digest = createHash('sha256').update(seedParts.join('|')).digest();
  return digest.readUInt32BE(0) % size;
}

function pickSeeded(table: RecommendationTable, input: ResolveInput): string | null {
  if (table.activities.length === 0) return null;
  const ordered = [...table.activities].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const index = seededIndex([input.courseId, input.participantKey, input.sessionDate], ordered.length);
  return ordered[index].id;
}

function applyStrategy(
  strategy: ResolverStrategy,
  table: RecommendationTable,
  input: ResolveInput,
): string | null {
  const { learningStyle, mood } = input;
  switch (strategy.kind) {
    case 'exact':
      if (learningStyle === null) return null;
      return findEntry(table, row =>
        !row.isStyleDefault && row.learningStyle === learningStyle && row.mood === mood);
    case 'style-default':
      if (learningStyle === null) return null;
      return findEntry(table, row => row.isStyleDefault && row.learningStyle === learningStyle);
    case 'mood-default':
      return findEntry(table, row =>
        !row.isStyleDefault && row.learningStyle === null && row.mood === mood);
    case 'random':
      return pickSeeded(table, input);
  }
}

// ── Resolution ───────────────────────────────────────────────────

export function resolveRecommendation(
  table: RecommendationTable,
  input: ResolveInput,
): RecommendationMatch {
  for (const strategy of STRATEGIES) {
    const activityId = applyStrategy(strategy, table, input);
    if (activityId !== null) {
      return { matchType: MATCH_TYPES[strategy.kind], activityId };
    }
  }
  return { matchType: 'none', activityId: null };
}

export async function loadRecommendationTable(
  storage: IStorage,
  courseId: string,
): Promise<RecommendationTable> {
  const [recommendations, activities] = await Promise.all([
    storage.listRecommendations(courseId),
    storage.listActivities(courseId),
  ]);
  return { recommendations, activities };
}

export function buildRecommendationPayload(
  match: RecommendationMatch,
  input: Pick<ResolveInput, 'learningStyle' | 'mood'>,
  activities: Activity[],
): RecommendationPayload {
  const activity = match.activityId
    ? activities.find(candidate => candidate.id === match.activityId)
    : undefined;

  return {
    matchType: match.matchType,
    learningStyle: input.learningStyle,
    mood: input.mood,
    activity: activity
      ? {
          activityId: activity.id,
          name: activity.name,
          summary: activity.summary,
          type: activity.type,
          content: { ...activity.content },
        }
      : null,
  };
}

export async function recommendForParticipant(
  storage: IStorage,
  input: ResolveInput,
): Promise<RecommendationPayload> {
  const table = await loadRecommendationTable(storage, input.courseId);
  const match = resolveRecommendation(table, input);
  console.log(
    `[Recommendation] course=${input.courseId} style=${input.learningStyle ?? 'none'} ` +
    `mood=${input.mood} match=${match.matchType} activity=${match.activityId ?? 'none'}`,
  );
  return buildRecommendationPayload(match, input, table.activities);
}

// ── Mapping maintenance ──────────────────────────────────────────

function sameKey(
  row: CourseRecommendation,
  key: { learningStyle: string | null; mood: string | null; isStyleDefault: boolean },
): boolean {
  return row.learningStyle === key.learningStyle
    && row.mood === key.mood
    && row.isStyleDefault === key.isStyleDefault;
}

async function upsertEntry(
  tx: IStorage,
  courseId: string,
  existing: CourseRecommendation[],
  key: { learningStyle: string | null; mood: string | null; isStyleDefault: boolean },
  activityId: string,
  isAuto: boolean,
): Promise<void> {
  const row = existing.find(candidate => sameKey(candidate, key));
  if (!row) {
    existing.push(await tx.insertRecommendation({ courseId, ...key, activityId, isAuto }));
    return;
  }
  // auto rows never overwrite a teacher's manual choice
  if (isAuto && !row.isAuto) return;
  if (row.activityId === activityId && row.isAuto === isAuto) return;

  const updated = await tx.updateRecommendation(row.id, { activityId, isAuto });
  if (updated) {
    existing[existing.indexOf(row)] = updated;
  }
}

/**
 * Saves teacher-defined mappings, then keeps the derived defaults in step:
 * each mood (and each style) mentioned by an exact mapping gets an automatic
 * default pointing at the last activity mapped for it, unless a manual default exists.
 */
export async function saveCourseRecommendations(
  storage: IStorage,
  courseId: string,
  entries: RecommendationEntry[],
): Promise<CourseRecommendation[]> {
  return storage.transaction(async (tx) => {
    const course = await tx.getCourse(courseId);
    if (!course) {
      throw new NotFoundError('COURSE_NOT_FOUND', `Course ${courseId} not found`);
    }

    const activityIds = new Set((await tx.listActivities(courseId)).map(activity => activity.id));
    for (const entry of entries) {
      if (!activityIds.has(entry.activityId)) {
        throw new ValidationError('UNKNOWN_ACTIVITY', `Activity ${entry.activityId} does not belong to course ${courseId}`);
      }
      if (entry.mood !== null && !course.moodLabels.includes(entry.mood)) {
        throw new ValidationError('INVALID_MOOD', `Mood "${entry.mood}" is not configured for course ${courseId}`);
      }
    }

    const existing = await tx.listRecommendations(courseId);
    const latestForMood = new Map<string, string>();
    const latestForStyle = new Map<string, string>();

    for (const entry of entries) {
      const key = { learningStyle: entry.learningStyle, mood: entry.mood, isStyleDefault: entry.isStyleDefault };
      await upsertEntry(tx, courseId, existing, key, entry.activityId, false);

      if (!entry.isStyleDefault && entry.learningStyle !== null && entry.mood !== null) {
        latestForMood.set(entry.mood, entry.activityId);
        latestForStyle.set(entry.learningStyle, entry.activityId);
      }
    }

    for (const [mood, activityId] of latestForMood) {
      await upsertEntry(tx, courseId, existing, { learningStyle: null, mood, isStyleDefault: false }, activityId, true);
    }
    for (const [learningStyle, activityId] of latestForStyle) {
      await upsertEntry(tx, courseId, existing, { learningStyle, mood: null, isStyleDefault: true }, activityId, true);
    }

    console.log(`[Recommendation] Saved ${entries.length} mapping(s) for course ${courseId}`);
    return tx.listRecommendations(courseId);
  });
}
