import { env } from '@/env';

export const gradingConfig = {
	components: {
		quiz: { label: 'Quiz', max: 20 },
		midterm: { label: 'Midterm', max: 30 },
		final: { label: 'Final', max: 50 }
	},
	totalMax: 100,
	passingPercentage: 50,
	// Inclusive lower bounds, checked top-down
	letterThresholds: [
		{ min: 90, letter: 'A+' },
		{ min: 85, letter: 'A' },
		{ min: 80, letter: 'A-' },
		{ min: 75, letter: 'B+' },
		{ min: 70, letter: 'B' },
		{ min: 65, letter: 'B-' },
		{ min: 60, letter: 'C+' },
		{ min: 55, letter: 'C' },
		{ min: 50, letter: 'C-' },
		{ min: 45, letter: 'D' }
	],
	failingLetter: 'F',
	// 10-point scale
	gradePoints: {
		'A+': 10,
		'A': 9,
		'A-': 8.5,
		'B+': 8,
		'B': 7,
		'B-': 6.5,
		'C+': 6,
		'C': 5.5,
		'C-': 5,
		'D': 4,
		'F': 0
	},
	performanceLevels: [
		{ min: 90, label: 'Excellent' },
		{ min: 80, label: 'Very Good' },
		{ min: 70, label: 'Good' },
		{ min: 60, label: 'Satisfactory' },
		{ min: 50, label: 'Passing' }
	],
	caching: {
		ttl: env.MAINTENANCE_CACHE_TTL_SECONDS,
		maxSize: 100
	}
} as const;
