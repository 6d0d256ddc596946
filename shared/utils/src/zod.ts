/**
 * Single import point for zod across the workspace.
 */
export { z, ZodError } from "zod";
