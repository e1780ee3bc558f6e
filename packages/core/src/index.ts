/**
 * @glucose-alarm/core
 *
 * Reading model, threshold evaluation and the alert state machine.
 */

export type {
  Timestamp,
  GlucoseUnit,
  Trend,
  Reading,
  AlertCondition,
  AlertKind,
  Thresholds,
  ThresholdConfig,
  AlertState,
  SnoozeRequest,
  SinkCommand,
  AlertTransition,
  TransitionOptions,
} from "./types.js";

export { classify, isAlerting, isUrgentLow } from "./thresholds.js";

export {
  INITIAL_ALERT_STATE,
  transition,
  applySnooze,
  cancelSnooze,
  isSnoozed,
  alertDuration,
} from "./alert-state.js";

export {
  systemTimeZone,
  getLocalTime,
  parseClockTime,
  isScheduleActive,
  activeSchedule,
  applySchedule,
  effectiveThresholds,
  type ThresholdSchedule,
  type LocalTime,
} from "./schedule.js";

export {
  zClockTime,
  zThresholdSchedule,
  zThresholdConfig,
  zSnoozeRequest,
  formatIssues,
  validateThresholdConfig,
  validateSchedules,
  validateSnoozeRequest,
} from "./config.js";

export {
  MonitorErrorCode,
  MonitorError,
  ConfigurationError,
  FetchError,
  PersistenceError,
  SinkError,
  SourceError,
  describeCause,
} from "./errors.js";

export {
  MGDL_PER_MMOL,
  mgdlToMmol,
  mmolToMgdl,
  fromMgdl,
  formatGlucose,
  trendFromDexcom,
  mapTrendArrow,
  trendArrow,
} from "./units.js";
