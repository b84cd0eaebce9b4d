import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  boolean,
  jsonb,
  index,
  uniqueIndex,
  unique,
  check,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ── Survey shapes (stored as jsonb) ──────────────────────────────

export const surveyOptionSchema = z.object({
  label: z.string().min(1),
  scores: z.record(z.string().min(1), z.number().nonnegative()),
});

export const surveyQuestionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  options: z.array(surveyOptionSchema),
});

export type SurveyOption = z.infer<typeof surveyOptionSchema>;
export type SurveyQuestion = z.infer<typeof surveyQuestionSchema>;

// Frozen copy of a survey embedded in a session at creation time
export interface SurveySnapshot {
  readonly surveyId: string | null;
  readonly title: string | null;
  readonly questions: readonly SurveyQuestion[];
}

// question id -> selected option label
export type SubmissionAnswers = Record<string, string>;

export interface AnswerDetail {
  questionId: string;
  questionText: string;
  selectedOption: string;
  options: string[];
}

export interface StoredAnswers {
  raw: SubmissionAnswers;
  details: Record<string, AnswerDetail>;
}

// Surveys table (baseline learning-style questionnaires)
export const surveys = pgTable("surveys", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  title: text("title").notNull(),
  questions: jsonb("questions").$type<SurveyQuestion[]>().notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Courses table
export const courses = pgTable("courses", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  title: text("title").notNull(),
  baselineSurveyId: varchar("baseline_survey_id").references(() => surveys.id, { onDelete: 'set null' }),
  learningStyleCategories: jsonb("learning_style_categories").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  moodLabels: jsonb("mood_labels").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  requiresRebaseline: boolean("requires_rebaseline").notNull().default(true),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Live class sessions; requireSurvey and the snapshot are frozen at creation
export const classSessions = pgTable(
  "class_sessions",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    courseId: varchar("course_id").notNull().references(() => courses.id, { onDelete: 'cascade' }),
    surveyId: varchar("survey_id").references(() => surveys.id, { onDelete: 'set null' }),
    requireSurvey: boolean("require_survey").notNull().default(false),
    surveySnapshot: jsonb("survey_snapshot").$type<SurveySnapshot>(),
    moodPrompt: text("mood_prompt").notNull(),
    moodOptions: jsonb("mood_options").$type<string[]>().notNull(),
    joinToken: varchar("join_token", { length: 64 }).notNull().unique(),
    startedAt: timestamp("started_at").defaultNow().notNull(),
    closedAt: timestamp("closed_at"),
  },
  (table) => [index("IDX_class_sessions_course").on(table.courseId)],
);

// Kinds of activity and the content fields each one must carry
export const activityTypes = pgTable("activity_types", {
  typeName: varchar("type_name", { length: 100 }).primaryKey(),
  description: text("description").notNull(),
  requiredFields: jsonb("required_fields").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  optionalFields: jsonb("optional_fields").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  exampleContent: jsonb("example_content").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Untyped activities; no registered activity type, no content requirements
export const GENERAL_ACTIVITY_TYPE = 'general';

// Activities a course can recommend
export const activities = pgTable(
  "activities",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    courseId: varchar("course_id").notNull().references(() => courses.id, { onDelete: 'cascade' }),
    name: text("name").notNull(),
    summary: text("summary").notNull().default(''),
    type: text("type").notNull().default(GENERAL_ACTIVITY_TYPE),
    tags: jsonb("tags").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
    content: jsonb("content").$type<Record<string, unknown>>().notNull().default(sql`'{}'::jsonb`),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [index("IDX_activities_course").on(table.courseId)],
);

// (learningStyle, mood, isStyleDefault) -> activity, per course.
// exact: (style, mood, false); style default: (style, null, true); mood default: (null, mood, false)
export const courseRecommendations = pgTable(
  "course_recommendations",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    courseId: varchar("course_id").notNull().references(() => courses.id, { onDelete: 'cascade' }),
    learningStyle: text("learning_style"),
    mood: text("mood"),
    isStyleDefault: boolean("is_style_default").notNull().default(false),
    activityId: varchar("activity_id").notNull().references(() => activities.id, { onDelete: 'cascade' }),
    isAuto: boolean("is_auto").notNull().default(false),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [
    unique("uq_course_style_mood").on(table.courseId, table.learningStyle, table.mood, table.isStyleDefault).nullsNotDistinct(),
    index("IDX_course_recommendations_course").on(table.courseId),
    check("ck_style_default_shape", sql`NOT ${table.isStyleDefault} OR (${table.learningStyle} IS NOT NULL AND ${table.mood} IS NULL)`),
  ],
);

// Submissions: one row per (session, participant); resubmission updates in place
export const submissions = pgTable(
  "submissions",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    sessionId: varchar("session_id").notNull().references(() => classSessions.id, { onDelete: 'cascade' }),
    courseId: varchar("course_id").notNull().references(() => courses.id, { onDelete: 'cascade' }),
    studentId: varchar("student_id"),
    guestId: varchar("guest_id"),
    guestName: text("guest_name"),
    mood: text("mood").notNull(),
    answers: jsonb("answers").$type<StoredAnswers>(),
    totalScores: jsonb("total_scores").$type<Record<string, number>>(),
    isBaselineUpdate: boolean("is_baseline_update").notNull().default(false),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("uq_session_student").on(table.sessionId, table.studentId),
    uniqueIndex("uq_session_guest").on(table.sessionId, table.guestId),
    check("ck_submission_student_or_guest", sql`(${table.studentId} IS NULL) <> (${table.guestId} IS NULL)`),
  ],
);

// Learning-style profiles; append-only history, at most one current row per participant
export const courseStudentProfiles = pgTable(
  "course_student_profiles",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    courseId: varchar("course_id").notNull().references(() => courses.id, { onDelete: 'cascade' }),
    studentId: varchar("student_id"),
    guestId: varchar("guest_id"),
    learningStyle: text("learning_style"),
    scores: jsonb("scores").$type<Record<string, number>>().notNull(),
    submissionId: varchar("submission_id").references(() => submissions.id, { onDelete: 'set null' }),
    isCurrent: boolean("is_current").notNull().default(true),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("uq_course_student_current").on(table.courseId, table.studentId).where(sql`${table.isCurrent}`),
    uniqueIndex("uq_course_guest_current").on(table.courseId, table.guestId).where(sql`${table.isCurrent}`),
    check("ck_profile_student_or_guest", sql`(${table.studentId} IS NULL) <> (${table.guestId} IS NULL)`),
  ],
);

// Relations
export const coursesRelations = relations(courses, ({ one, many }) => ({
  baselineSurvey: one(surveys, {
    fields: [courses.baselineSurveyId],
    references: [surveys.id],
  }),
  sessions: many(classSessions),
  activities: many(activities),
  recommendations: many(courseRecommendations),
  profiles: many(courseStudentProfiles),
}));

export const classSessionsRelations = relations(classSessions, ({ one, many }) => ({
  course: one(courses, {
    fields: [classSessions.courseId],
    references: [courses.id],
  }),
  submissions: many(submissions),
}));

export const courseRecommendationsRelations = relations(courseRecommendations, ({ one }) => ({
  course: one(courses, {
    fields: [courseRecommendations.courseId],
    references: [courses.id],
  }),
  activity: one(activities, {
    fields: [courseRecommendations.activityId],
    references: [activities.id],
  }),
}));

// Insert schemas
const labelListSchema = z
  .array(z.string().trim().min(1))
  .refine((labels) => new Set(labels).size === labels.length, {
    message: "Labels must be unique",
  });

export const insertSurveySchema = createInsertSchema(surveys)
  .omit({
    id: true,
    createdAt: true,
    updatedAt: true,
  })
  .extend({
    title: z.string().trim().min(1),
    questions: z.array(surveyQuestionSchema),
  });

export const insertCourseSchema = createInsertSchema(courses)
  .omit({
    id: true,
    requiresRebaseline: true,
    createdAt: true,
    updatedAt: true,
  })
  .extend({
    title: z.string().trim().min(1),
    baselineSurveyId: z.string().min(1).nullable().optional(),
    learningStyleCategories: labelListSchema.default([]),
    moodLabels: labelListSchema.default([]),
  });

export const updateCourseSchema = insertCourseSchema.partial();

export const insertActivityTypeSchema = createInsertSchema(activityTypes)
  .omit({
    createdAt: true,
    updatedAt: true,
  })
  .extend({
    typeName: z.string().trim().min(1).max(100),
    description: z.string().trim().min(1),
    requiredFields: labelListSchema.default([]),
    optionalFields: labelListSchema.default([]),
    exampleContent: z.record(z.unknown()).nullable().optional(),
  });

export const insertActivitySchema = createInsertSchema(activities)
  .omit({
    id: true,
    courseId: true,
    createdAt: true,
    updatedAt: true,
  })
  .extend({
    name: z.string().trim().min(1),
    summary: z.string().optional(),
    type: z.string().trim().min(1).optional(),
    tags: z.array(z.string().trim().min(1)).optional(),
    content: z.record(z.unknown()).optional(),
  });

// The type of an activity is fixed once created
export const updateActivitySchema = insertActivitySchema.omit({ type: true }).partial();

export const recommendationEntrySchema = z
  .object({
    learningStyle: z.string().trim().min(1).nullable(),
    mood: z.string().trim().min(1).nullable(),
    isStyleDefault: z.boolean().default(false),
    activityId: z.string().min(1),
  })
  .refine((entry) => !entry.isStyleDefault || (entry.learningStyle !== null && entry.mood === null), {
    message: "Style defaults need a learning style and no mood",
  })
  .refine((entry) => entry.isStyleDefault || entry.mood !== null, {
    message: "Entries other than style defaults need a mood",
  });

export type Survey = typeof surveys.$inferSelect;
export type InsertSurvey = z.infer<typeof insertSurveySchema>;
export type Course = typeof courses.$inferSelect;
export type InsertCourse = z.infer<typeof insertCourseSchema>;
export type UpdateCourse = z.infer<typeof updateCourseSchema>;
export type ClassSession = typeof classSessions.$inferSelect;
export type InsertClassSession = typeof classSessions.$inferInsert;
export type ActivityType = typeof activityTypes.$inferSelect;
export type InsertActivityType = z.infer<typeof insertActivityTypeSchema>;
export type Activity = typeof activities.$inferSelect;
export type InsertActivity = z.infer<typeof insertActivitySchema>;
export type UpdateActivity = z.infer<typeof updateActivitySchema>;
export type CourseRecommendation = typeof courseRecommendations.$inferSelect;
export type RecommendationEntry = z.infer<typeof recommendationEntrySchema>;
export type Submission = typeof submissions.$inferSelect;
export type InsertSubmission = typeof submissions.$inferInsert;
export type CourseStudentProfile = typeof courseStudentProfiles.$inferSelect;
export type InsertCourseStudentProfile = typeof courseStudentProfiles.$inferInsert;
