import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { canAccessStudentData } from "@/lib/access";
import {
  createTRPCRouter,
  protectedProcedure,
  studentProcedure,
} from "../trpc";

const sectionInput = z.object({
  sectionId: z.string().min(1, "Section ID is required"),
});

export const registrationRouter = createTRPCRouter({
  register: studentProcedure
    .input(sectionInput)
    .mutation(async ({ ctx, input }) => {
      try {
        return await ctx.services.registration.register(
          ctx.role.studentId,
          input.sectionId
        );
      } catch (error) {
        console.error("Failed to register for section:", error);
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to register for section",
          cause: error,
        });
      }
    }),

  drop: studentProcedure
    .input(sectionInput)
    .mutation(async ({ ctx, input }) => {
      try {
        return await ctx.services.registration.drop(
          ctx.role.studentId,
          input.sectionId
        );
      } catch (error) {
        console.error("Failed to drop section:", error);
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to drop section",
          cause: error,
        });
      }
    }),

  timetable: studentProcedure.query(async ({ ctx }) => {
    try {
      return await ctx.services.registration.getTimetable(ctx.role.studentId);
    } catch (error) {
      console.error("Failed to fetch timetable:", error);
      throw new TRPCError({
        code: "INTERNAL_SERVER_ERROR",
        message: "Failed to fetch timetable",
        cause: error,
      });
    }
  }),

  enrollments: studentProcedure.query(async ({ ctx }) => {
    try {
      return await ctx.services.registration.getAllEnrollments(ctx.role.studentId);
    } catch (error) {
      console.error("Failed to fetch enrollments:", error);
      throw new TRPCError({
        code: "INTERNAL_SERVER_ERROR",
        message: "Failed to fetch enrollments",
        cause: error,
      });
    }
  }),

  transcript: protectedProcedure
    .input(z.object({ studentId: z.string().min(1, "Student ID is required") }))
    .query(async ({ ctx, input }) => {
      if (!canAccessStudentData(ctx.role, input.studentId)) {
        throw new TRPCError({
          code: "FORBIDDEN",
          message: "You cannot view this student's records",
        });
      }

      try {
        const [records, cgpa] = await Promise.all([
          ctx.services.transcripts.getTranscript(input.studentId),
          ctx.services.transcripts.getCgpa(input.studentId),
        ]);
        return { records, cgpa };
      } catch (error) {
        console.error("Failed to fetch transcript:", error);
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to fetch transcript",
          cause: error,
        });
      }
    }),
});
