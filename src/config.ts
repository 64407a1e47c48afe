/***
 * Config — App options, validated once by the builder.
 *
 * Everything but `logger` goes through AppOptionsSchema; unknown keys are
 * stripped and missing ones take their defaults. The logger override is a
 * live object and is passed through untouched.
 *
 ***/

import { z } from "zod";
import type { StateValue } from "./state";
import { DEFAULT_APP_NAME, DEFAULT_STATE } from "./utils/constants";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";
import { LOG_LEVELS, type LogLevel, type Logger } from "./utils/logger";

export const AppOptionsSchema = z.object({
  name: z.string().min(1).default(DEFAULT_APP_NAME),
  initial_state: z
    .union([z.string().min(1), z.number().int()])
    .default(DEFAULT_STATE),
  log_level: z.enum(LOG_LEVELS).default("warn"),
  log_json: z.boolean().default(false),
  track_archetypes: z.boolean().default(true),
});

export type AppConfig = z.infer<typeof AppOptionsSchema>;

export interface AppOptions<S extends StateValue = StateValue> {
  name?: string;
  initial_state?: S;
  log_level?: LogLevel;
  log_json?: boolean;
  /** When false, queries are rebuilt before every run and on_new_archetype never fires. */
  track_archetypes?: boolean;
  logger?: Logger;
}

export function resolve_app_config(options: AppOptions): AppConfig {
  const parsed = AppOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new SchedulerError(
      SCHEDULER_ERROR.INVALID_OPTIONS,
      `Invalid app options: ${issues}`,
      { issues },
    );
  }
  return parsed.data;
}
