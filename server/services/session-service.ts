import { randomBytes } from 'crypto';
import type { ClassSession, Course, SubmissionAnswers, SurveySnapshot } from '@shared/schema';
import { participantKey, type IStorage, type ParticipantIdentity } from '../storage';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { config } from '../config';
import { shouldForceBaseline } from './baseline-service';
import { buildSurveySnapshot, dominantCategoryOf, toPublicSurvey, type PublicSurvey } from './survey-service';
import {
  buildRecommendationPayload,
  loadRecommendationTable,
  resolveRecommendation,
  type RecommendationPayload,
} from './recommendation-service';

export type SessionStatus = 'OPEN' | 'CLOSED';

export interface CreateSessionOptions {
  // A teacher may ask for the survey even when the course does not force it
  requireSurvey?: boolean;
  moodPrompt?: string | null;
  generateJoinToken?: () => string;
}

export interface PublicSessionView {
  sessionId: string;
  courseTitle: string;
  status: SessionStatus;
  requireSurvey: boolean;
  moodPrompt: string;
  moodOptions: string[];
  survey: PublicSurvey | null;
}

export interface DashboardParticipant {
  submissionId: string;
  mode: 'student' | 'guest';
  studentId: string | null;
  guestId: string | null;
  displayName: string;
  mood: string;
  learningStyle: string | null;
  recommendation: RecommendationPayload;
}

export interface SessionDashboard {
  sessionId: string;
  courseId: string;
  courseTitle: string;
  requireSurvey: boolean;
  status: SessionStatus;
  moodSummary: Record<string, number>;
  participants: DashboardParticipant[];
}

export interface SubmissionItem {
  submissionId: string;
  studentId: string | null;
  guestId: string | null;
  guestName: string | null;
  mood: string;
  answers: SubmissionAnswers | null;
  totalScores: Record<string, number> | null;
  learningStyle: string | null;
  isBaselineUpdate: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionSubmissions {
  sessionId: string;
  count: number;
  items: SubmissionItem[];
}

export function generateJoinToken(length: number = config.JOIN_TOKEN_LENGTH): string {
  return randomBytes(Math.ceil(length * 0.75) + 1).toString('base64url').slice(0, length);
}

export function sessionStatus(session: ClassSession): SessionStatus {
  return session.closedAt === null ? 'OPEN' : 'CLOSED';
}

export function sessionDate(session: ClassSession): string {
  return session.startedAt.toISOString().slice(0, 10);
}

async function requireCourse(storage: IStorage, courseId: string): Promise<Course> {
  const course = await storage.getCourse(courseId);
  if (!course) {
    throw new NotFoundError('COURSE_NOT_FOUND', `Course ${courseId} not found`);
  }
  return course;
}

export async function requireSession(storage: IStorage, sessionId: string): Promise<ClassSession> {
  const session = await storage.getSession(sessionId);
  if (!session) {
    throw new NotFoundError('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
  }
  return session;
}

export async function createSession(
  storage: IStorage,
  courseId: string,
  options: CreateSessionOptions = {},
): Promise<ClassSession> {
  return storage.transaction(async (tx) => {
    const course = await requireCourse(tx, courseId);

    if (course.moodLabels.length === 0) {
      throw new ValidationError('COURSE_MOOD_LABELS_NOT_CONFIGURED', `Course ${courseId} has no mood labels`);
    }

    const requireSurvey = shouldForceBaseline(course) || options.requireSurvey === true;

    let surveySnapshot: SurveySnapshot | null = null;
    if (requireSurvey) {
      const survey = course.baselineSurveyId ? await tx.getSurvey(course.baselineSurveyId) : undefined;
      if (!survey) {
        throw new ValidationError(
          'COURSE_BASELINE_SURVEY_NOT_CONFIGURED',
          `Course ${courseId} requires a baseline survey but none is configured`,
        );
      }
      surveySnapshot = buildSurveySnapshot(survey);
    }

    const moodPrompt = options.moodPrompt?.trim() || config.DEFAULT_MOOD_PROMPT;
    const session = await tx.createSession({
      courseId: course.id,
      surveyId: surveySnapshot?.surveyId ?? course.baselineSurveyId,
      requireSurvey,
      surveySnapshot,
      moodPrompt,
      moodOptions: [...course.moodLabels],
      joinToken: (options.generateJoinToken ?? generateJoinToken)(),
    });

    console.log(`[Session] Created session ${session.id} for course ${course.id} require_survey=${requireSurvey}`);
    return session;
  });
}

export async function listCourseSessions(storage: IStorage, courseId: string): Promise<ClassSession[]> {
  await requireCourse(storage, courseId);
  return storage.listSessions(courseId);
}

export async function closeSession(storage: IStorage, sessionId: string): Promise<ClassSession> {
  return storage.transaction(async (tx) => {
    const session = await tx.lockSession(sessionId);
    if (!session) {
      throw new NotFoundError('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
    }
    if (session.closedAt !== null) {
      throw new ConflictError('SESSION_ALREADY_CLOSED', `Session ${sessionId} is already closed`);
    }

    const closed = await tx.closeSession(sessionId, new Date());
    if (!closed) {
      throw new NotFoundError('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
    }
    console.log(`[Session] Closed session ${sessionId}`);
    return closed;
  });
}

export async function getPublicSession(storage: IStorage, joinToken: string): Promise<PublicSessionView> {
  const session = await storage.getSessionByJoinToken(joinToken);
  if (!session) {
    throw new NotFoundError('SESSION_NOT_FOUND', 'No session for this join token');
  }
  if (session.closedAt !== null) {
    throw new ConflictError('SESSION_CLOSED', `Session ${session.id} is closed`);
  }
  const course = await requireCourse(storage, session.courseId);

  return {
    sessionId: session.id,
    courseTitle: course.title,
    status: sessionStatus(session),
    requireSurvey: session.requireSurvey,
    moodPrompt: session.moodPrompt,
    moodOptions: [...session.moodOptions],
    survey: session.surveySnapshot ? toPublicSurvey(session.surveySnapshot) : null,
  };
}

function participantOf(submission: { studentId: string | null; guestId: string | null }): ParticipantIdentity | null {
  if (submission.studentId) return { kind: 'student', studentId: submission.studentId };
  if (submission.guestId) return { kind: 'guest', guestId: submission.guestId };
  return null;
}

export async function getSessionDashboard(storage: IStorage, sessionId: string): Promise<SessionDashboard> {
  const session = await requireSession(storage, sessionId);
  const course = await requireCourse(storage, session.courseId);

  const [submissions, profiles, table] = await Promise.all([
    storage.listSubmissions(session.id),
    storage.listCurrentProfilesForCourse(course.id),
    loadRecommendationTable(storage, course.id),
  ]);

  const styleByStudent = new Map<string, string | null>();
  const styleByGuest = new Map<string, string | null>();
  for (const profile of profiles) {
    if (profile.studentId) styleByStudent.set(profile.studentId, profile.learningStyle);
    if (profile.guestId) styleByGuest.set(profile.guestId, profile.learningStyle);
  }

  const moodSummary: Record<string, number> = {};
  const participants: DashboardParticipant[] = [];

  for (const submission of submissions) {
    const participant = participantOf(submission);
    if (!participant) continue;

    moodSummary[submission.mood] = (moodSummary[submission.mood] ?? 0) + 1;

    const learningStyle = participant.kind === 'student'
      ? styleByStudent.get(participant.studentId) ?? null
      : styleByGuest.get(participant.guestId) ?? null;

    const input = {
      courseId: course.id,
      learningStyle,
      mood: submission.mood,
      participantKey: participantKey(participant),
      sessionDate: sessionDate(session),
    };

    participants.push({
      submissionId: submission.id,
      mode: participant.kind,
      studentId: submission.studentId,
      guestId: submission.guestId,
      displayName: participant.kind === 'student' ? 'Student' : submission.guestName || 'Guest',
      mood: submission.mood,
      learningStyle,
      recommendation: buildRecommendationPayload(resolveRecommendation(table, input), input, table.activities),
    });
  }

  return {
    sessionId: session.id,
    courseId: course.id,
    courseTitle: course.title,
    requireSurvey: session.requireSurvey,
    status: sessionStatus(session),
    moodSummary,
    participants,
  };
}

// Raw submissions in arrival order; learning style is recomputed from the stored totals
export async function listSessionSubmissions(storage: IStorage, sessionId: string): Promise<SessionSubmissions> {
  const session = await requireSession(storage, sessionId);
  const course = await requireCourse(storage, session.courseId);
  const submissions = await storage.listSubmissions(session.id);

  const items = submissions.map((submission): SubmissionItem => ({
    submissionId: submission.id,
    studentId: submission.studentId,
    guestId: submission.guestId,
    guestName: submission.guestName,
    mood: submission.mood,
    answers: submission.answers ? { ...submission.answers.raw } : null,
    totalScores: submission.totalScores ? { ...submission.totalScores } : null,
    learningStyle: submission.totalScores
      ? dominantCategoryOf(submission.totalScores, course.learningStyleCategories)
      : null,
    isBaselineUpdate: submission.isBaselineUpdate,
    createdAt: submission.createdAt,
    updatedAt: submission.updatedAt,
  }));

  return { sessionId: session.id, count: items.length, items };
}
