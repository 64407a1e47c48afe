/***
 * Stage — Ordered phases of a tick.
 *
 * Systems run in ascending stage order, and in registration order within
 * a stage. EVENT_RESET is reserved for the event clearing systems: it runs
 * strictly after LAST and user systems may not be added to it.
 *
 ***/

export enum STAGE {
  FIRST = 0,
  ASSET_LOAD = 1,
  ASSET_EVENTS = 2,
  PRE_UPDATE = 3,
  UPDATE = 4,
  POST_UPDATE = 5,
  PRE_RENDER = 6,
  RENDER = 7,
  LAST = 8,
  EVENT_RESET = 9,
}

export const is_reserved_stage = (stage: STAGE): boolean =>
  stage === STAGE.EVENT_RESET;

export const stage_name = (stage: STAGE): string => STAGE[stage];
