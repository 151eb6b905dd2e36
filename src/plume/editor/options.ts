import { z, type ZodError } from "zod";
import type { CursorPosition, Selection } from "../core/types";
import type { Clock } from "../shared/clock";
import { HISTORY_GROUPING_INTERVAL_MS } from "../history/edit-operation";
import { DEFAULT_MAX_HISTORY } from "../history/history";

const SessionOptionsSchema = z.object({
  viewportLines: z.number().int().positive().default(30),
  scrollMargin: z.number().int().nonnegative().default(3),
  maxHistory: z.number().int().positive().default(DEFAULT_MAX_HISTORY),
  groupingIntervalMs: z
    .number()
    .nonnegative()
    .default(HISTORY_GROUPING_INTERVAL_MS),
});

export type ResolvedSessionOptions = z.infer<typeof SessionOptionsSchema>;

export type SessionChangeEvent = {
  /** Container version after the change. */
  version: number;
};

export type EditSessionOptions = Partial<ResolvedSessionOptions> & {
  clock?: Clock;
  onChange?: (event: SessionChangeEvent) => void;
  onSelectionChange?: (selection: Selection, cursor: CursorPosition) => void;
};

export const defaultSessionOptions: Readonly<ResolvedSessionOptions> =
  Object.freeze(SessionOptionsSchema.parse({}));

export class SessionOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid session options:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    );
    this.name = "SessionOptionsError";
    this.issues = issues;
  }
}

function formatSchemaError(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return `Field "${path}": ${issue.message}`;
  });
}

/** Validates the numeric options and fills in defaults. */
export function resolveSessionOptions(
  options: EditSessionOptions = {},
): ResolvedSessionOptions {
  const result = SessionOptionsSchema.safeParse({
    viewportLines: options.viewportLines,
    scrollMargin: options.scrollMargin,
    maxHistory: options.maxHistory,
    groupingIntervalMs: options.groupingIntervalMs,
  });
  if (!result.success) {
    throw new SessionOptionsError(formatSchemaError(result.error));
  }
  return result.data;
}
