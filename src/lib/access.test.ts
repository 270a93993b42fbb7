import { describe, expect, it } from "vitest";
import { authorize, canAccessSection, canAccessStudentData, MAINTENANCE_DENIAL_REASON } from "./access";
import type { Role } from "@/types/access";

const admin: Role = { kind: "ADMIN", adminId: "admin-1" };
const student: Role = { kind: "STUDENT", studentId: "stu-1" };
const instructor: Role = { kind: "INSTRUCTOR", instructorId: "inst-1" };

describe("access gate", () => {
  it("lets an administrator write during maintenance", () => {
    expect(authorize(admin, true, true)).toEqual({ allowed: true });
  });

  it("denies a student write during maintenance", () => {
    expect(authorize(student, true, true)).toEqual({
      allowed: false,
      reason: MAINTENANCE_DENIAL_REASON,
    });
  });

  it("denies an instructor write during maintenance", () => {
    expect(authorize(instructor, true, true).allowed).toBe(false);
  });

  it("allows reads during maintenance", () => {
    expect(authorize(student, false, true)).toEqual({ allowed: true });
  });

  it("allows writes outside maintenance", () => {
    expect(authorize(student, true, false)).toEqual({ allowed: true });
  });

  it("limits student data to the student themself and administrators", () => {
    expect(canAccessStudentData(student, "stu-1")).toBe(true);
    expect(canAccessStudentData(student, "stu-2")).toBe(false);
    expect(canAccessStudentData(admin, "stu-2")).toBe(true);
    expect(canAccessStudentData(instructor, "stu-1")).toBe(false);
  });

  it("limits section access to its instructor and administrators", () => {
    expect(canAccessSection(instructor, "inst-1")).toBe(true);
    expect(canAccessSection(instructor, "inst-2")).toBe(false);
    expect(canAccessSection(instructor, null)).toBe(false);
    expect(canAccessSection(admin, null)).toBe(true);
    expect(canAccessSection(student, "inst-1")).toBe(false);
  });
});
