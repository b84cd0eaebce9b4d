/**
 * Baseline survey scoring.
 *
 * Categories are never hard-coded: they are the union of every score key that
 * appears on any option of the snapshot, in the order they are first met while
 * walking questions and options.
 */

import type {
  AnswerDetail,
  Survey,
  SurveySnapshot,
  SubmissionAnswers,
} from '@shared/schema';

export interface ScoreResult {
  totals: Record<string, number>;
  // null when nothing scored ("none")
  dominantCategory: string | null;
}

export interface PublicSurveyQuestion {
  questionId: string;
  text: string;
  options: string[];
}

export interface PublicSurvey {
  surveyId: string | null;
  title: string | null;
  questions: PublicSurveyQuestion[];
}

export function extractCategories(snapshot: SurveySnapshot): string[] {
  const seen = new Set<string>();
  for (const question of snapshot.questions) {
    for (const option of question.options) {
      for (const category of Object.keys(option.scores)) {
        seen.add(category);
      }
    }
  }
  return [...seen];
}

export function buildSurveySnapshot(survey: Survey): SurveySnapshot {
  // Deep copy: later edits to the live survey must not reach the session
  const questions = survey.questions.map(question => ({
    id: question.id,
    text: question.text,
    options: question.options.map(option => ({
      label: option.label,
      scores: { ...option.scores },
    })),
  }));

  return Object.freeze({
    surveyId: survey.id,
    title: survey.title,
    questions,
  });
}

/**
 * Orders categories for tie-breaking: those in the course's configured list
 * first (in that order), then the rest by first appearance in the snapshot.
 */
function tieBreakOrder(discovered: string[], priority: readonly string[]): string[] {
  const listed = priority.filter(category => discovered.includes(category));
  const rest = discovered.filter(category => !listed.includes(category));
  return [...listed, ...rest];
}

export function determineDominantCategory(
  totals: Record<string, number>,
  order: readonly string[],
): string | null {
  let best: string | null = null;
  let bestScore = 0;
  for (const category of order) {
    const score = totals[category] ?? 0;
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }
  return best;
}

export function scoreAnswers(
  snapshot: SurveySnapshot,
  answers: SubmissionAnswers,
  priority: readonly string[] = [],
): ScoreResult {
  const categories = extractCategories(snapshot);
  const totals: Record<string, number> = {};
  for (const category of categories) {
    totals[category] = 0;
  }

  for (const question of snapshot.questions) {
    const selected = answers[question.id];
    if (typeof selected !== 'string') continue;

    const option = question.options.find(candidate => candidate.label === selected);
    if (!option) continue;

    for (const [category, score] of Object.entries(option.scores)) {
      totals[category] += score;
    }
  }

  return {
    totals,
    dominantCategory: determineDominantCategory(totals, tieBreakOrder(categories, priority)),
  };
}

// For totals already stored on a submission; the course's list breaks ties first
export function dominantCategoryOf(
  totals: Record<string, number>,
  priority: readonly string[] = [],
): string | null {
  return determineDominantCategory(totals, tieBreakOrder(Object.keys(totals), priority));
}

// Participant-facing copy of a snapshot; scores stay server-side
export function toPublicSurvey(snapshot: SurveySnapshot): PublicSurvey {
  return {
    surveyId: snapshot.surveyId,
    title: snapshot.title,
    questions: snapshot.questions.map(question => ({
      questionId: question.id,
      text: question.text,
      options: question.options.map(option => option.label),
    })),
  };
}

export function buildAnswerDetails(
  snapshot: SurveySnapshot,
  answers: SubmissionAnswers,
): Record<string, AnswerDetail> {
  const details: Record<string, AnswerDetail> = {};
  for (const question of snapshot.questions) {
    const selected = answers[question.id];
    if (typeof selected !== 'string') continue;

    const labels = question.options.map(option => option.label);
    if (!labels.includes(selected)) continue;

    details[question.id] = {
      questionId: question.id,
      questionText: question.text,
      selectedOption: selected,
      options: labels,
    };
  }
  return details;
}
