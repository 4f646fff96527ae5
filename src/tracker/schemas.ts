import { z } from 'zod';

export const envelopeSchema = z.object({
  category: z.string(),
  request: z.string().optional(),
  statuscode: z.number().int(),
  statusmessage: z.string().optional(),
  values: z.record(z.unknown()).optional(),
});

export type TrackerMessage = z.infer<typeof envelopeSchema>;

const pointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

const eyeSchema = z.object({
  raw: pointSchema,
  avg: pointSchema,
  psize: z.number(),
  pcenter: pointSchema,
});

export const framePayloadSchema = z.object({
  time: z.number(),
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d{1,6})?$/),
  fix: z.boolean(),
  state: z.number().int().nonnegative(),
  raw: pointSchema,
  avg: pointSchema,
  lefteye: eyeSchema,
  righteye: eyeSchema,
});

export type FramePayload = z.infer<typeof framePayloadSchema>;

export const calibrationPointSchema = z.object({
  state: z.number().int(),
  cp: pointSchema,
  mecp: pointSchema,
  acd: z.object({ ad: z.number(), adl: z.number(), adr: z.number() }),
  mepix: z.object({ mep: z.number(), mepl: z.number(), mepr: z.number() }),
  asdp: z.object({ asd: z.number(), asdl: z.number(), asdr: z.number() }),
});

export const calibrationResultSchema = z.object({
  result: z.boolean(),
  deg: z.number(),
  degl: z.number(),
  degr: z.number(),
  calibpoints: z.array(calibrationPointSchema),
});

export type CalibrationResultPayload = z.infer<typeof calibrationResultSchema>;

export const initValuesSchema = z.object({
  iscalibrated: z.boolean().optional(),
  heartbeatinterval: z.coerce.number().int().nonnegative(),
});

export const screenResolutionValuesSchema = z.object({
  screenresw: z.number().int().positive(),
  screenresh: z.number().int().positive(),
});
