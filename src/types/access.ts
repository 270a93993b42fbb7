export type Role =
	| { kind: 'ADMIN'; adminId: string }
	| { kind: 'INSTRUCTOR'; instructorId: string }
	| { kind: 'STUDENT'; studentId: string };

export type AccessDecision =
	| { allowed: true }
	| { allowed: false; reason: string };
