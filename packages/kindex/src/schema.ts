import { z } from 'zod';

export const stationCodeSchema = z
  .string()
  .trim()
  .min(2, 'Station code must be at least 2 characters long')
  .max(8, 'Station code must be at most 8 characters long')
  .regex(/^[A-Za-z0-9]+$/, 'Station code must contain only letters and digits')
  .transform((value) => value.toUpperCase());

export const stationConfigSchema = z.object({
  code: stationCodeSchema,
  name: z.string().trim().min(1).optional(),
  k9Limit: z.coerce.number().positive('k9Limit must be positive').finite(),
  lenDays: z.coerce.number().int().positive().default(3),
  pollIntervalMinutes: z.coerce.number().positive().default(10),
  sourceDir: z.string().trim().min(1).optional(),
  remotePath: z.string().trim().min(1).optional()
});

export type StationConfig = Readonly<z.output<typeof stationConfigSchema>>;

export const stationListSchema = z
  .array(stationConfigSchema)
  .min(1, 'At least one station must be configured')
  .superRefine((stations, ctx) => {
    const seen = new Set<string>();
    stations.forEach((station, index) => {
      if (seen.has(station.code)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate station code ${station.code}`,
          path: [index, 'code']
        });
      }
      seen.add(station.code);
    });
  });
