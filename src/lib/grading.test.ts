import { describe, expect, it } from "vitest";
import {
  cgpa,
  classStatistics,
  formatComponent,
  gpaPoints,
  isComplete,
  isPassing,
  letterGrade,
  letterGradeFor,
  percentage,
  performanceLevel,
  totalScore,
} from "./grading";
import type { AssessmentComponents } from "@/types/assessment";

const full: AssessmentComponents = { quiz: 18, midterm: 25, final: 44 };
const missingFinal: AssessmentComponents = { quiz: 20, midterm: 30, final: null };

describe("grade engine", () => {
  describe("component totals", () => {
    it("sums only the entered components", () => {
      expect(totalScore(full)).toBe(87);
      expect(totalScore(missingFinal)).toBe(50);
      expect(totalScore({ quiz: null, midterm: null, final: null })).toBe(0);
    });

    it("is incomplete whenever any component is missing", () => {
      expect(isComplete(full)).toBe(true);
      expect(isComplete(missingFinal)).toBe(false);
      expect(isComplete({ quiz: null, midterm: 30, final: 50 })).toBe(false);
      expect(isComplete({ quiz: 20, midterm: null, final: 50 })).toBe(false);
    });

    it("counts an entered zero as present", () => {
      expect(isComplete({ quiz: 0, midterm: 0, final: 0 })).toBe(true);
      expect(letterGradeFor({ quiz: 0, midterm: 0, final: 0 })).toBe("F");
    });

    it("reports percentage only for complete records", () => {
      expect(percentage(full)).toBe(87);
      expect(percentage(missingFinal)).toBe(0);
    });
  });

  describe("letter grades", () => {
    it.each([
      [100, "A+"],
      [90, "A+"],
      [89.999, "A"],
      [85, "A"],
      [84.5, "A-"],
      [80, "A-"],
      [75, "B+"],
      [70, "B"],
      [65, "B-"],
      [60, "C+"],
      [55, "C"],
      [50, "C-"],
      [45, "D"],
      [44.99, "F"],
      [0, "F"],
    ])("maps %s to %s", (score, letter) => {
      expect(letterGrade(score)).toBe(letter);
    });

    it("returns the not-graded marker for incomplete records", () => {
      expect(letterGradeFor(missingFinal)).toBe("N/A");
      expect(letterGradeFor(full)).toBe("A");
    });

    it("describes performance and passing", () => {
      expect(performanceLevel(full)).toBe("Very Good");
      expect(performanceLevel(missingFinal)).toBe("Not Graded");
      expect(performanceLevel({ quiz: 5, midterm: 10, final: 20 })).toBe("Needs Improvement");
      expect(isPassing({ quiz: 10, midterm: 15, final: 25 })).toBe(true);
      expect(isPassing({ quiz: 10, midterm: 15, final: 24 })).toBe(false);
      expect(isPassing(missingFinal)).toBe(false);
    });

    it("formats components for display", () => {
      expect(formatComponent(15, 20)).toBe("15/20");
      expect(formatComponent(null, 20)).toBe("N/A");
    });
  });

  describe("grade points and cgpa", () => {
    it("uses the 10-point scale", () => {
      expect(gpaPoints("A+")).toBe(10);
      expect(gpaPoints("A-")).toBe(8.5);
      expect(gpaPoints("B-")).toBe(6.5);
      expect(gpaPoints("D")).toBe(4);
      expect(gpaPoints("F")).toBe(0);
      expect(gpaPoints("Z")).toBe(0);
      expect(gpaPoints(null)).toBe(0);
    });

    it("weights grade points by credits", () => {
      const result = cgpa([
        { finalGrade: "A", credits: 4 },
        { finalGrade: "B", credits: 2 },
      ]);
      expect(result).toBeCloseTo(50 / 6, 10);
    });

    it("leaves ungraded entries out of both sums", () => {
      const result = cgpa([
        { finalGrade: "A+", credits: 4 },
        { finalGrade: null, credits: 4 },
        { finalGrade: "", credits: 2 },
      ]);
      expect(result).toBe(10);
    });

    it("is zero when nothing is graded", () => {
      expect(cgpa([])).toBe(0);
      expect(cgpa([{ finalGrade: null, credits: 3 }])).toBe(0);
    });
  });

  describe("class statistics", () => {
    it("scores complete records and buckets recorded final grades", () => {
      const stats = classStatistics(
        [
          { studentId: "s1", finalGrade: "A" },
          { studentId: "s2", finalGrade: null },
          { studentId: "s3", finalGrade: "F" },
          { studentId: "s4", finalGrade: "B" },
        ],
        [
          { studentId: "s1", quiz: 18, midterm: 25, final: 44 },
          { studentId: "s2", quiz: 20, midterm: 30, final: null },
          { studentId: "s3", quiz: 10, midterm: 10, final: 20 },
        ]
      );

      expect(stats.totalStudents).toBe(4);
      expect(stats.gradedCount).toBe(2);
      expect(stats.averageScore).toBe(63.5);
      expect(stats.minScore).toBe(40);
      expect(stats.maxScore).toBe(87);
      expect(stats.distributionByLetter.A).toBe(1);
      expect(stats.distributionByLetter.B).toBe(1);
      expect(stats.distributionByLetter.F).toBe(1);
      expect(stats.distributionByLetter["N/A"]).toBe(1);
      expect(stats.distributionByLetter["A+"]).toBe(0);
    });

    it("defaults scores to zero without complete records", () => {
      const stats = classStatistics([{ studentId: "s1", finalGrade: null }], []);
      expect(stats).toMatchObject({
        totalStudents: 1,
        gradedCount: 0,
        averageScore: 0,
        minScore: 0,
        maxScore: 0,
      });
      expect(stats.distributionByLetter["N/A"]).toBe(1);
    });
  });
});
