import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { adminProcedure, createTRPCRouter, protectedProcedure } from "../trpc";

export const adminRouter = createTRPCRouter({
  maintenanceMode: protectedProcedure.query(async ({ ctx }) => {
    try {
      return { enabled: await ctx.services.maintenance.isActive() };
    } catch (error) {
      console.error("Failed to read maintenance mode:", error);
      throw new TRPCError({
        code: "INTERNAL_SERVER_ERROR",
        message: "Failed to read maintenance mode",
        cause: error,
      });
    }
  }),

  setMaintenanceMode: adminProcedure
    .input(z.object({ enabled: z.boolean() }))
    .mutation(async ({ ctx, input }) => {
      try {
        return await ctx.services.maintenance.setMaintenanceMode(ctx.role, input.enabled);
      } catch (error) {
        console.error("Failed to update maintenance mode:", error);
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to update maintenance mode",
          cause: error,
        });
      }
    }),

  refreshMaintenanceMode: adminProcedure.mutation(async ({ ctx }) => {
    try {
      return { enabled: await ctx.services.maintenance.refresh() };
    } catch (error) {
      console.error("Failed to refresh maintenance mode:", error);
      throw new TRPCError({
        code: "INTERNAL_SERVER_ERROR",
        message: "Failed to refresh maintenance mode",
        cause: error,
      });
    }
  }),
});
