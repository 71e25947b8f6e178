import { SelectionPolicy } from "./selection-result";
import { TrainRecordJson } from "./train-record";

export interface StationRef {
    name: string;
    code: string;
}

export interface TrainSearchQuery {
    source: StationRef;
    destination: StationRef;
}

export interface TrainSearchOptions {
    now?: Date;
    outputJson?: string;
}

export type TrainSearchOutcome =
    | {
          status: "ok";
          url: string;
          policy: SelectionPolicy;
          totalFound: number;
          trains: TrainRecordJson[];
      }
    | { status: "no_trains"; url: string; message: string }
    | { status: "invalid_stations"; url: string; message: string };
