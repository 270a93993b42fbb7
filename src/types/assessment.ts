import { z } from 'zod';

/**
 * A missing component is `null`: not yet entered, which is different from a
 * score of zero.
 */
export const assessmentComponentsSchema = z.object({
	quiz: z.number().nullable().default(null),
	midterm: z.number().nullable().default(null),
	final: z.number().nullable().default(null)
});

export type AssessmentComponents = z.infer<typeof assessmentComponentsSchema>;

export type AssessmentComponentKey = keyof AssessmentComponents;

export interface AssessmentRecord extends AssessmentComponents {
	studentId: string;
	sectionId: string;
}

export interface CompleteAssessment {
	quiz: number;
	midterm: number;
	final: number;
}

export interface GradeEntry {
	studentId: string;
	sectionId: string;
	components: AssessmentComponents;
}

export interface ValidationResult {
	isValid: boolean;
	errors: string[];
}
