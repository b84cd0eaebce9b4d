import type { Activity, ClassSession, Course, CourseRecommendation, InsertSurvey, Survey } from "@shared/schema";
import { createCourse, createSurvey } from "../../server/services/course-service";
import { addActivity } from "../../server/services/activity-service";
import { createSession } from "../../server/services/session-service";
import { MemStorage } from "./mem-storage";

export const learningStyleSurvey: InsertSurvey = {
  title: "How do you learn best?",
  questions: [
    {
      id: "q1",
      text: "How do you prefer to meet a new topic?",
      options: [
        { label: "Look at a diagram", scores: { Visual: 2 } },
        { label: "Hear it explained", scores: { Auditory: 2 } },
        { label: "Try it with my hands", scores: { Kinesthetic: 2 } },
      ],
    },
    {
      id: "q2",
      text: "What helps you remember?",
      options: [
        { label: "Pictures", scores: { Visual: 1 } },
        { label: "Talking it through", scores: { Auditory: 1 } },
        { label: "Doing it again", scores: { Kinesthetic: 1 } },
      ],
    },
  ],
};

export const visualAnswers = { q1: "Look at a diagram", q2: "Pictures" };
export const auditoryAnswers = { q1: "Hear it explained", q2: "Talking it through" };

export interface SeededCourse {
  storage: MemStorage;
  survey: Survey;
  course: Course;
  activities: { x: Activity; y: Activity; z: Activity };
}

let tokenCounter = 0;
export function nextJoinToken(): string {
  tokenCounter += 1;
  return `join-token-${tokenCounter}`;
}

export async function seedCourse(storage: MemStorage = new MemStorage()): Promise<SeededCourse> {
  const survey = await createSurvey(storage, learningStyleSurvey);
  const course = await createCourse(storage, {
    title: "Biology 101",
    baselineSurveyId: survey.id,
    learningStyleCategories: ["Visual", "Auditory", "Kinesthetic"],
    moodLabels: ["energized", "calm", "tired"],
  });
  const x = await addActivity(storage, course.id, { name: "Mind map" });
  const y = await addActivity(storage, course.id, { name: "Quick quiz" });
  const z = await addActivity(storage, course.id, { name: "Diagram walk" });
  return { storage, survey, course, activities: { x, y, z } };
}

export async function openSession(
  storage: MemStorage,
  courseId: string,
  requireSurvey?: boolean,
): Promise<ClassSession> {
  return createSession(storage, courseId, { requireSurvey, generateJoinToken: nextJoinToken });
}

export function recommendationRow(overrides: Partial<CourseRecommendation> & { activityId: string }): CourseRecommendation {
  const at = new Date(Date.UTC(2025, 0, 1));
  return {
    id: `rec-${Math.random().toString(36).slice(2)}`,
    courseId: "course-1",
    learningStyle: null,
    mood: null,
    isStyleDefault: false,
    isAuto: false,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

export function activityRow(id: string, courseId = "course-1"): Activity {
  return {
    id,
    courseId,
    name: `Activity ${id}`,
    summary: "",
    type: "general",
    tags: [],
    content: {},
    createdAt: new Date(Date.UTC(2025, 0, 1)),
    updatedAt: new Date(Date.UTC(2025, 0, 1)),
  };
}
