/**
 * Time types shared between query and dataset definitions.
 */

/** Half-open time interval `[start, end)` */
export interface TimeInterval {
  start: Date;
  end: Date;
}

export type TimeGranularity =
  | "Millis"
  | "Seconds"
  | "Minutes"
  | "Hours"
  | "Days"
  | "Months"
  | "Years";

/** A regular step in time, e.g. 1 Days */
export interface TimeStep {
  granularity: TimeGranularity;
  step: number;
}
