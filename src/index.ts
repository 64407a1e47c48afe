// App
export { App } from "./app";
export { AppBuilder, type Plugin } from "./app_builder";
export {
  AppOptionsSchema,
  resolve_app_config,
  type AppConfig,
  type AppOptions,
} from "./config";
export { AppExit, AppControl } from "./exit";
export { run_once, run_loop, loop_runner, type Runner, type RunLoopOptions } from "./runner";

// Schedule
export { STAGE, stage_name } from "./stage";
export { Schedule } from "./schedule";

// Systems
export { SystemContext } from "./context";
export {
  SYSTEM_KIND,
  startup,
  stateless,
  in_state,
  on_enter,
  on_exit,
  type SystemID,
  type SystemKind,
  type SystemFn,
  type SystemConfig,
  type SystemDescriptor,
  type SystemInput,
  system_label,
} from "./system";

// State
export { State, STATE_EDGE, type StateValue } from "./state";

// Resources
export {
  ResourceStore,
  type ResourceType,
  type DefaultResourceType,
} from "./resource";

// Events
export { Events, EventRegistry, type EventType } from "./event";

// Store
export { Store } from "./store";
export { Commands, type Command } from "./commands";
export { Archetype, type ArchetypeID } from "./archetype";
export {
  component,
  type ComponentDef,
  type ComponentEntry,
  type ComponentValue,
} from "./component";
export type { EntityID } from "./entity";

// Queries
export { Query } from "./query";

// Errors and logging
export { AppError, SchedulerError, SCHEDULER_ERROR, is_scheduler_error } from "./utils/error";
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./utils/logger";
