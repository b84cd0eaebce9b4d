import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import {
  insertActivitySchema,
  insertActivityTypeSchema,
  insertCourseSchema,
  insertSurveySchema,
  recommendationEntrySchema,
  updateActivitySchema,
  updateCourseSchema,
} from "@shared/schema";
import type { IStorage } from "./storage";
import { AppError, ValidationError } from "./errors";
import { createCourse, createSurvey, getCourse, getSurvey, listCourses, updateCourse, updateSurvey } from "./services/course-service";
import {
  addActivity,
  createActivityType,
  getActivity,
  listActivityTypes,
  listCourseActivities,
  updateActivity,
} from "./services/activity-service";
import {
  closeSession,
  createSession,
  getPublicSession,
  getSessionDashboard,
  listCourseSessions,
  listSessionSubmissions,
} from "./services/session-service";
import { saveCourseRecommendations } from "./services/recommendation-service";
import { submitByJoinToken } from "./services/submission-service";

const createSessionSchema = z.object({
  requireSurvey: z.boolean().optional(),
  moodPrompt: z.string().max(500).nullable().optional(),
});

const activityQuerySchema = z.object({
  tag: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
});

const recommendationsSchema = z.object({
  entries: z.array(recommendationEntrySchema),
});

const participantSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('student'), studentId: z.string().min(1) }),
  z.object({ kind: z.literal('guest'), guestId: z.string().min(1), guestName: z.string().trim().min(1).max(255).optional() }),
]);

const submitSchema = z.object({
  participant: participantSchema,
  mood: z.string().min(1),
  answers: z.record(z.string().min(1), z.string()).nullable().optional(),
});

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const validation = schema.safeParse(body);
  if (!validation.success) {
    throw new ValidationError(
      'VALIDATION_ERROR',
      validation.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
    );
  }
  return validation.data;
}

type Handler = (req: Request, res: Response) => Promise<void>;

// Wraps async handlers so AppErrors reach the error middleware
function route(tag: string, handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch((error: unknown) => {
      if (!(error instanceof AppError) || error.status >= 500) {
        console.error(`[${tag}] Error:`, error);
      }
      next(error);
    });
  };
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof AppError) {
    res.status(error.status).json({ error: error.code, message: error.message });
    return;
  }
  res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
}

export function registerRoutes(app: Express, storage: IStorage): Server {
  // ── Surveys ──────────────────────────────────────────────────
  app.post('/api/surveys', route('Survey', async (req, res) => {
    const survey = await createSurvey(storage, parseBody(insertSurveySchema, req.body));
    res.status(201).json(survey);
  }));

  app.get('/api/surveys/:id', route('Survey', async (req, res) => {
    res.json(await getSurvey(storage, req.params.id));
  }));

  app.put('/api/surveys/:id', route('Survey', async (req, res) => {
    res.json(await updateSurvey(storage, req.params.id, parseBody(insertSurveySchema, req.body)));
  }));

  // ── Activity types ───────────────────────────────────────────
  app.get('/api/activity-types', route('Activity', async (_req, res) => {
    res.json(await listActivityTypes(storage));
  }));

  app.post('/api/activity-types', route('Activity', async (req, res) => {
    const activityType = await createActivityType(storage, parseBody(insertActivityTypeSchema, req.body));
    res.status(201).json(activityType);
  }));

  // ── Activities ───────────────────────────────────────────────
  app.get('/api/activities/:id', route('Activity', async (req, res) => {
    res.json(await getActivity(storage, req.params.id));
  }));

  app.patch('/api/activities/:id', route('Activity', async (req, res) => {
    res.json(await updateActivity(storage, req.params.id, parseBody(updateActivitySchema, req.body)));
  }));

  // ── Courses ──────────────────────────────────────────────────
  app.get('/api/courses', route('Course', async (_req, res) => {
    res.json(await listCourses(storage));
  }));

  app.post('/api/courses', route('Course', async (req, res) => {
    const course = await createCourse(storage, parseBody(insertCourseSchema, req.body));
    res.status(201).json(course);
  }));

  app.get('/api/courses/:id', route('Course', async (req, res) => {
    res.json(await getCourse(storage, req.params.id));
  }));

  app.patch('/api/courses/:id', route('Course', async (req, res) => {
    res.json(await updateCourse(storage, req.params.id, parseBody(updateCourseSchema, req.body)));
  }));

  app.get('/api/courses/:id/activities', route('Activity', async (req, res) => {
    const filter = parseBody(activityQuerySchema, req.query);
    res.json(await listCourseActivities(storage, req.params.id, filter));
  }));

  app.post('/api/courses/:id/activities', route('Activity', async (req, res) => {
    const activity = await addActivity(storage, req.params.id, parseBody(insertActivitySchema, req.body));
    res.status(201).json(activity);
  }));

  app.put('/api/courses/:id/recommendations', route('Recommendation', async (req, res) => {
    const { entries } = parseBody(recommendationsSchema, req.body);
    res.json(await saveCourseRecommendations(storage, req.params.id, entries));
  }));

  // ── Sessions ─────────────────────────────────────────────────
  app.get('/api/courses/:id/sessions', route('Session', async (req, res) => {
    res.json(await listCourseSessions(storage, req.params.id));
  }));

  app.post('/api/courses/:id/sessions', route('Session', async (req, res) => {
    const options = parseBody(createSessionSchema, req.body ?? {});
    const session = await createSession(storage, req.params.id, options);
    res.status(201).json(session);
  }));

  app.post('/api/sessions/:id/close', route('Session', async (req, res) => {
    const session = await closeSession(storage, req.params.id);
    res.json({ status: 'CLOSED', closedAt: session.closedAt });
  }));

  app.get('/api/sessions/:id/submissions', route('Session', async (req, res) => {
    res.json(await listSessionSubmissions(storage, req.params.id));
  }));

  app.get('/api/sessions/:id/dashboard', route('Session', async (req, res) => {
    res.json(await getSessionDashboard(storage, req.params.id));
  }));

  // ── Public join ──────────────────────────────────────────────
  app.get('/api/public/join/:token', route('Join', async (req, res) => {
    res.json(await getPublicSession(storage, req.params.token));
  }));

  app.post('/api/public/join/:token/submit', route('Submission', async (req, res) => {
    const body = parseBody(submitSchema, req.body);
    const outcome = await submitByJoinToken(storage, req.params.token, {
      participant: body.participant,
      mood: body.mood,
      answers: body.answers,
    });
    res.json({
      submissionId: outcome.submission.id,
      totalScores: outcome.scoreResult?.totals ?? null,
      learningStyle: outcome.recommendation.learningStyle,
      requiresRebaseline: outcome.requiresRebaseline,
      recommendation: outcome.recommendation,
    });
  }));

  app.use(errorHandler);

  return createServer(app);
}
