import type { gradingConfig } from '@/config/grading';

export type LetterGrade = keyof typeof gradingConfig.gradePoints;

export const NOT_GRADED = 'N/A';

export type GradeBucket = LetterGrade | typeof NOT_GRADED;

export interface CgpaEntry {
	finalGrade: string | null;
	credits: number;
}

export interface ClassStatistics {
	totalStudents: number;
	gradedCount: number;
	averageScore: number;
	minScore: number;
	maxScore: number;
	distributionByLetter: Record<string, number>;
}

export interface TranscriptRecord {
	enrollmentId: string;
	courseCode: string;
	courseTitle: string;
	credits: number;
	grade: LetterGrade;
	term?: string;
}

export interface FinalGradeResult {
	letter: LetterGrade;
	percentage: number;
}
