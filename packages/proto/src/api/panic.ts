import { z } from 'zod';

export const PanicReportSchema = z.object({
  version: z.string(),
  text: z.string(),
});

export type PanicReport = z.infer<typeof PanicReportSchema>;
