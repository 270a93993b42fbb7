import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { assessmentComponentsSchema } from "@/types/assessment";
import { createTRPCRouter, instructorProcedure } from "../trpc";

const sectionInput = z.object({
  sectionId: z.string().min(1, "Section ID is required"),
});

const studentSectionInput = sectionInput.extend({
  studentId: z.string().min(1, "Student ID is required"),
});

function internalError(message: string, error: unknown): TRPCError {
  console.error(`${message}:`, error);
  return new TRPCError({
    code: "INTERNAL_SERVER_ERROR",
    message,
    cause: error,
  });
}

export const gradingRouter = createTRPCRouter({
  enterGrade: instructorProcedure
    .input(studentSectionInput.extend({ components: assessmentComponentsSchema }))
    .mutation(async ({ ctx, input }) => {
      try {
        return await ctx.services.grading.enterGrade(
          ctx.role.instructorId,
          input.studentId,
          input.sectionId,
          input.components
        );
      } catch (error) {
        throw internalError("Failed to save grades", error);
      }
    }),

  computeFinalGrade: instructorProcedure
    .input(studentSectionInput)
    .mutation(async ({ ctx, input }) => {
      try {
        return await ctx.services.grading.computeFinalGrade(
          ctx.role.instructorId,
          input.studentId,
          input.sectionId
        );
      } catch (error) {
        throw internalError("Failed to compute final grade", error);
      }
    }),

  computeAllFinalGrades: instructorProcedure
    .input(sectionInput)
    .mutation(async ({ ctx, input }) => {
      try {
        return await ctx.services.grading.computeAllFinalGrades(
          ctx.role.instructorId,
          input.sectionId
        );
      } catch (error) {
        throw internalError("Failed to compute final grades", error);
      }
    }),

  roster: instructorProcedure
    .input(sectionInput)
    .query(async ({ ctx, input }) => {
      try {
        return await ctx.services.grading.getSectionRoster(
          ctx.role.instructorId,
          input.sectionId
        );
      } catch (error) {
        throw internalError("Failed to fetch roster", error);
      }
    }),

  sectionGrades: instructorProcedure
    .input(sectionInput)
    .query(async ({ ctx, input }) => {
      try {
        return await ctx.services.grading.getSectionGrades(
          ctx.role.instructorId,
          input.sectionId
        );
      } catch (error) {
        throw internalError("Failed to fetch section grades", error);
      }
    }),

  classStatistics: instructorProcedure
    .input(sectionInput)
    .query(async ({ ctx, input }) => {
      try {
        return await ctx.services.grading.getClassStatistics(
          ctx.role.instructorId,
          input.sectionId
        );
      } catch (error) {
        throw internalError("Failed to compute class statistics", error);
      }
    }),
});
