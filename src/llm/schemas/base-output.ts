import { z } from "zod";

/**
 * Minimal structured reply: the model's answer as a single string.
 */
export const baseOutputSchema = z.object({
  data: z.string().describe("The answer to the prompt"),
});

export type BaseOutput = z.infer<typeof baseOutputSchema>;
