import { z } from "zod";

/* -----------------------------
   Stored event payload
----------------------------- */

export const RawFrameSchema = z.object({
  function: z.string().nullish(),
  module: z.string().nullish(),
  filename: z.string().nullish(),
  lineno: z.number().nullish(),
  in_app: z.boolean().nullish(),
  context_line: z.string().nullish()
});

export const ExceptionValueSchema = z.object({
  type: z.string().nullish(),
  value: z.string().nullish(),
  mechanism: z
    .object({
      handled: z.boolean().nullish(),
      meta: z.record(z.unknown()).nullish()
    })
    .nullish(),
  stacktrace: z
    .object({
      frames: z.array(RawFrameSchema).nullish()
    })
    .nullish()
});

export const EventDataSchema = z.object({
  tags: z.array(z.tuple([z.string(), z.string()])).default([]),
  exception: z
    .object({
      values: z.array(ExceptionValueSchema).nullish()
    })
    .nullish(),
  message: z.string().nullish(),
  hashes: z.array(z.string()).optional()
});

export type RawFrame = z.infer<typeof RawFrameSchema>;
export type ExceptionValue = z.infer<typeof ExceptionValueSchema>;
export type EventData = z.infer<typeof EventDataSchema>;

export type StoredEvent = {
  projectId: string;
  eventId: string;
  data: EventData;
};

/* -----------------------------
   Summary sent to the model
----------------------------- */

export type SummaryFrame = {
  func: string | null;
  module: string | null;
  file: string | null;
  line: number | null;
  in_app?: true;
  crashed_here?: true;
  code?: string;
};

export type SummaryException = {
  raised_during_handling_of_previous_exception?: true;
  number: number;
  type: string | null;
  message: string | null;
  meta?: Record<string, unknown>;
  unhandled?: true;
  stacktrace?: SummaryFrame[];
};

export type EventSummary = {
  tags: Record<string, string>;
  exceptions: SummaryException[];
  message?: string;
};

/* -----------------------------
   Projects
----------------------------- */

export type Organization = {
  id: string;
  slug: string;
};

export type Project = {
  id: string;
  slug: string;
  organization: Organization;
};
