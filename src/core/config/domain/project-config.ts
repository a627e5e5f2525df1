import { z } from "zod";

export const PROJECT_CONFIG_FILENAME = "savekeep.json";

export const projectTitleSchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .refine((title) => !/[\\/]/.test(title), "must not contain path separators")
  .refine((title) => title !== "." && title !== "..", "must not be a relative directory name");

export const projectConfigSchema = z.object({
  project: z.object({
    title: projectTitleSchema
  })
});

export type ProjectConfig = z.infer<typeof projectConfigSchema>;
