import { describe, expect, it } from "vitest";
import type { SubmissionAnswers, Survey, SurveySnapshot } from "@shared/schema";
import {
  buildAnswerDetails,
  buildSurveySnapshot,
  extractCategories,
  scoreAnswers,
  toPublicSurvey,
} from "../server/services/survey-service";
import { learningStyleSurvey } from "./support/fixtures";

function snapshotOf(questions: SurveySnapshot["questions"]): SurveySnapshot {
  return { surveyId: "survey-1", title: "Baseline", questions };
}

const baseline: SurveySnapshot = snapshotOf(learningStyleSurvey.questions);

describe("extractCategories", () => {
  it("collects every score key in first-seen order", () => {
    expect(extractCategories(baseline)).toEqual(["Visual", "Auditory", "Kinesthetic"]);
  });

  it("returns nothing for an empty snapshot", () => {
    expect(extractCategories(snapshotOf([]))).toEqual([]);
  });
});

describe("scoreAnswers", () => {
  it("scores the selected option of a two-option question", () => {
    const snapshot = snapshotOf([
      {
        id: "q1",
        text: "Pick one",
        options: [
          { label: "first", scores: { A: 2 } },
          { label: "second", scores: { B: 3 } },
        ],
      },
    ]);

    expect(scoreAnswers(snapshot, { q1: "second" })).toEqual({
      totals: { A: 0, B: 3 },
      dominantCategory: "B",
    });
  });

  it("sums scores across answered questions", () => {
    const result = scoreAnswers(baseline, { q1: "Look at a diagram", q2: "Talking it through" });
    expect(result.totals).toEqual({ Visual: 2, Auditory: 1, Kinesthetic: 0 });
    expect(result.dominantCategory).toBe("Visual");
  });

  it("ignores unknown questions and unmatched labels", () => {
    const result = scoreAnswers(baseline, { q1: "look at a diagram", q9: "Pictures" });
    expect(result.totals).toEqual({ Visual: 0, Auditory: 0, Kinesthetic: 0 });
    expect(result.dominantCategory).toBeNull();
  });

  it("scores partial answers", () => {
    const result = scoreAnswers(baseline, { q2: "Doing it again" });
    expect(result.totals).toEqual({ Visual: 0, Auditory: 0, Kinesthetic: 1 });
    expect(result.dominantCategory).toBe("Kinesthetic");
  });

  it("returns an all-zero result for an empty snapshot", () => {
    expect(scoreAnswers(snapshotOf([]), { q1: "anything" })).toEqual({ totals: {}, dominantCategory: null });
  });

  describe("ties", () => {
    const tied = snapshotOf([
      {
        id: "q1",
        text: "Tie",
        options: [{ label: "both", scores: { A: 1, B: 1 } }],
      },
    ]);

    it("falls back to first-seen order without a priority list", () => {
      expect(scoreAnswers(tied, { q1: "both" }).dominantCategory).toBe("A");
    });

    it("prefers the first category of the course's list", () => {
      expect(scoreAnswers(tied, { q1: "both" }, ["B", "A"]).dominantCategory).toBe("B");
    });

    it("skips listed categories the survey never mentions", () => {
      expect(scoreAnswers(tied, { q1: "both" }, ["C", "B"]).dominantCategory).toBe("B");
    });
  });

  it("always names a discovered category or none", () => {
    const answerSets: SubmissionAnswers[] = [
      {},
      { q1: "Hear it explained" },
      { q1: "Try it with my hands", q2: "Pictures" },
      { q1: "Look at a diagram", q2: "Doing it again" },
      { q1: "nope", q2: "nope" },
    ];
    const categories = extractCategories(baseline);
    for (const answers of answerSets) {
      const { dominantCategory } = scoreAnswers(baseline, answers);
      expect(dominantCategory === null || categories.includes(dominantCategory)).toBe(true);
    }
  });
});

describe("buildSurveySnapshot", () => {
  it("is not affected by later edits to the survey", () => {
    const survey: Survey = {
      id: "survey-1",
      title: "Baseline",
      questions: structuredClone(learningStyleSurvey.questions),
      createdAt: new Date(),
      updatedAt: new Date(),
    };

    const snapshot = buildSurveySnapshot(survey);
    survey.questions[0].options[0].scores.Visual = 99;
    survey.questions.push({ id: "q3", text: "New", options: [] });

    expect(snapshot.questions).toHaveLength(2);
    expect(snapshot.questions[0].options[0].scores).toEqual({ Visual: 2 });
    expect(snapshot.surveyId).toBe("survey-1");
  });
});

describe("toPublicSurvey", () => {
  it("drops the scores", () => {
    expect(toPublicSurvey(baseline).questions[1]).toEqual({
      questionId: "q2",
      text: "What helps you remember?",
      options: ["Pictures", "Talking it through", "Doing it again"],
    });
  });
});

describe("buildAnswerDetails", () => {
  it("records matched answers with their question text", () => {
    const details = buildAnswerDetails(baseline, { q1: "Hear it explained", q2: "unknown" });
    expect(details).toEqual({
      q1: {
        questionId: "q1",
        questionText: "How do you prefer to meet a new topic?",
        selectedOption: "Hear it explained",
        options: ["Look at a diagram", "Hear it explained", "Try it with my hands"],
      },
    });
  });
});
