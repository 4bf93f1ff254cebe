import { z } from 'zod';

export const ContainerSummarySchema = z.object({
  Id: z.string(),
  Names: z.array(z.string()).optional().default([]),
  Image: z.string(),
  ImageID: z.string(),
  State: z.string().optional(),
  Status: z.string().optional(),
}).passthrough();

export const ContainerSummaryArraySchema = z.array(ContainerSummarySchema);

export type ContainerSummary = z.infer<typeof ContainerSummarySchema>;
