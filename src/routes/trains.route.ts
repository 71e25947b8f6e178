import { NextFunction, Request, Response, Router } from "express";
import { TrainSearchService } from "../services/train-search.service";
import { ScheduleFetchError } from "../services/schedule-fetcher.service";
import { SelectionPolicy } from "../models/selection-result";
import { TrainRecordJson } from "../models/train-record";

export type TrainSearcher = Pick<TrainSearchService, "searchTrains">;

const REQUIRED_PARAMS = ["src_name", "src_code", "dst_name", "dst_code"] as const;

type RequiredParam = (typeof REQUIRED_PARAMS)[number];

export type TrainsResponseBody =
  | {
      success: true;
      data: TrainRecordJson[];
      total_count: number;
      policy: SelectionPolicy | null;
      timestamp: string;
      message: string;
    }
  | {
      success: false;
      error: string;
      message?: string;
      missing?: RequiredParam[];
      timestamp: string;
    };

export interface TrainsReply {
  status: number;
  body: TrainsResponseBody;
}

function readParam(query: Record<string, unknown>, name: RequiredParam): string {
  const value = query[name];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Validates the query string, runs the search and shapes the reply.
 * Errors other than a failed page fetch are rethrown.
 */
export async function handleTrainsQuery(
  searchService: TrainSearcher,
  query: Record<string, unknown>,
  now: Date = new Date()
): Promise<TrainsReply> {
  const timestamp = now.toISOString();
  const missing = REQUIRED_PARAMS.filter((name) => readParam(query, name) === "");

  if (missing.length > 0) {
    return {
      status: 400,
      body: { success: false, error: "All parameters must be provided", missing, timestamp },
    };
  }

  try {
    const outcome = await searchService.searchTrains(
      {
        source: { name: readParam(query, "src_name"), code: readParam(query, "src_code") },
        destination: { name: readParam(query, "dst_name"), code: readParam(query, "dst_code") },
      },
      { now }
    );

    if (outcome.status === "invalid_stations") {
      return { status: 400, body: { success: false, error: outcome.message, timestamp } };
    }

    if (outcome.status === "no_trains") {
      return {
        status: 200,
        body: { success: true, data: [], total_count: 0, policy: null, timestamp, message: outcome.message },
      };
    }

    return {
      status: 200,
      body: {
        success: true,
        data: outcome.trains,
        total_count: outcome.trains.length,
        policy: outcome.policy,
        timestamp,
        message: `Found ${outcome.trains.length} trains`,
      },
    };
  } catch (error) {
    if (error instanceof ScheduleFetchError) {
      return {
        status: 502,
        body: {
          success: false,
          error: "Could not reach the schedule site",
          message: error.message,
          timestamp,
        },
      };
    }
    throw error;
  }
}

export function createTrainsRouter(searchService: TrainSearcher): Router {
  const router = Router();

  /**
   * GET /api/trains/json?src_name=&src_code=&dst_name=&dst_code=
   */
  router.get("/json", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const reply = await handleTrainsQuery(searchService, req.query);
      res.status(reply.status).json(reply.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
