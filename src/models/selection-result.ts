import { ScheduledTrain } from "./train-record";

export const SELECTION_POLICIES = ["mixed", "non_local", "local", "local_fallback", "other"] as const;

export type SelectionPolicy = (typeof SELECTION_POLICIES)[number];

export interface SelectionResult {
    /** null when there was nothing to select from */
    policy: SelectionPolicy | null;
    trains: ScheduledTrain[];
}

export interface SelectionClock {
    now: Date;
    timeZone: string;
}
