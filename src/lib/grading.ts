import { gradingConfig } from '@/config/grading';
import type { AssessmentComponents, CompleteAssessment } from '@/types/assessment';
import { NOT_GRADED, type CgpaEntry, type ClassStatistics, type GradeBucket, type LetterGrade } from '@/types/grades';
import type { Enrollment } from '@/types/registration';

const GRADE_POINTS = new Map<string, number>(Object.entries(gradingConfig.gradePoints));

export const LETTER_GRADES: readonly LetterGrade[] = [
	...gradingConfig.letterThresholds.map(threshold => threshold.letter),
	gradingConfig.failingLetter
];

/** Sums the entered components; missing ones add nothing. */
export function totalScore(record: AssessmentComponents): number {
	return (record.quiz ?? 0) + (record.midterm ?? 0) + (record.final ?? 0);
}

export function isComplete<T extends AssessmentComponents>(record: T): record is T & CompleteAssessment {
	return record.quiz !== null && record.midterm !== null && record.final !== null;
}

/** Percentage out of 100; 0 until every component is in. */
export function percentage(record: AssessmentComponents): number {
	if (!isComplete(record)) return 0;
	return totalScore(record) * (100 / gradingConfig.totalMax);
}

export function letterGrade(totalPercentage: number): LetterGrade {
	for (const { min, letter } of gradingConfig.letterThresholds) {
		if (totalPercentage >= min) return letter;
	}
	return gradingConfig.failingLetter;
}

export function letterGradeFor(record: AssessmentComponents): LetterGrade | typeof NOT_GRADED {
	if (!isComplete(record)) return NOT_GRADED;
	return letterGrade(percentage(record));
}

export function isPassing(record: AssessmentComponents): boolean {
	return isComplete(record) && percentage(record) >= gradingConfig.passingPercentage;
}

export function performanceLevel(record: AssessmentComponents): string {
	if (!isComplete(record)) return 'Not Graded';
	const pct = percentage(record);
	for (const { min, label } of gradingConfig.performanceLevels) {
		if (pct >= min) return label;
	}
	return 'Needs Improvement';
}

/** "15/20", or "N/A" when the component has not been entered. */
export function formatComponent(value: number | null, max: number): string {
	if (value === null) return NOT_GRADED;
	return `${value.toFixed(0)}/${max}`;
}

export function gpaPoints(letter: string | null | undefined): number {
	if (!letter) return 0;
	return GRADE_POINTS.get(letter) ?? 0;
}

/**
 * Credit-weighted mean of grade points. Entries without a final letter are
 * left out of both sums.
 */
export function cgpa(entries: readonly CgpaEntry[]): number {
	let totalGradePoints = 0;
	let totalCredits = 0;

	for (const entry of entries) {
		if (!entry.finalGrade) continue;
		totalGradePoints += gpaPoints(entry.finalGrade) * entry.credits;
		totalCredits += entry.credits;
	}

	return totalCredits > 0 ? totalGradePoints / totalCredits : 0;
}

function emptyDistribution(): Record<string, number> {
	const distribution: Record<string, number> = {};
	for (const letter of LETTER_GRADES) {
		distribution[letter] = 0;
	}
	distribution[NOT_GRADED] = 0;
	return distribution;
}

/**
 * Score statistics come from complete assessment records only. The letter
 * distribution uses each enrollment's recorded final grade, not one
 * recomputed from its scores.
 */
export function classStatistics(
	enrollments: readonly Pick<Enrollment, 'studentId' | 'finalGrade'>[],
	assessmentRecords: readonly (AssessmentComponents & { studentId: string })[]
): ClassStatistics {
	const recordsByStudent = new Map(assessmentRecords.map(record => [record.studentId, record]));
	const distributionByLetter = emptyDistribution();

	let sum = 0;
	let gradedCount = 0;
	let minScore = Number.POSITIVE_INFINITY;
	let maxScore = Number.NEGATIVE_INFINITY;

	for (const enrollment of enrollments) {
		const record = recordsByStudent.get(enrollment.studentId);
		if (record && isComplete(record)) {
			const score = totalScore(record);
			sum += score;
			gradedCount++;
			minScore = Math.min(minScore, score);
			maxScore = Math.max(maxScore, score);
		}

		const bucket: GradeBucket = enrollment.finalGrade ?? NOT_GRADED;
		distributionByLetter[bucket] = (distributionByLetter[bucket] ?? 0) + 1;
	}

	return {
		totalStudents: enrollments.length,
		gradedCount,
		averageScore: gradedCount > 0 ? sum / gradedCount : 0,
		minScore: gradedCount > 0 ? minScore : 0,
		maxScore: gradedCount > 0 ? maxScore : 0,
		distributionByLetter
	};
}
