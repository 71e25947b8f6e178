#!/usr/bin/env node
import { createInterface } from "readline/promises";
import { getAppConfig } from "../config/app-config";
import { SelectionPolicy } from "../models/selection-result";
import { TrainRecordJson } from "../models/train-record";
import { TrainSearchQuery } from "../models/train-search";
import { createTrainSearchService } from "../services/train-search.service";

const DEFAULT_OUTPUT = "next_3_trains.json";

const POLICY_HEADINGS: Record<SelectionPolicy, string> = {
    mixed: "FIRST 3 TRAINS (Mixed Local and Non-Local)",
    non_local: "NEXT 3 NON-LOCAL TRAINS",
    local: "ALL TRAINS UP TO 1 HOUR FROM NOW (Local Trains Only)",
    local_fallback: "NEXT 3 TRAINS (Fallback - No trains within 1 hour)",
    other: "NEXT 3 TRAINS (Other Types)",
};

export function parseOutputArg(argv: readonly string[]): string {
    const index = argv.indexOf("--output");
    if (index >= 0 && index + 1 < argv.length) {
        return argv[index + 1];
    }
    return DEFAULT_OUTPUT;
}

export function formatTrainList(policy: SelectionPolicy, trains: readonly TrainRecordJson[]): string {
    const rule = "=".repeat(80);
    const lines = ["", rule, POLICY_HEADINGS[policy], rule];

    trains.forEach((train, index) => {
        lines.push(
            "",
            `${index + 1}. Train No: ${train.train_number}`,
            `   Name: ${train.train_name}`,
            `   Type: ${train.train_type}`,
            `   Departure: ${train.departure_time} from ${train.source}`,
            `   Arrival: ${train.arrival_time} at ${train.destination}`,
            `   Duration: ${train.duration}`,
            `   Booking Classes: ${train.booking_classes.length > 0 ? train.booking_classes.join(", ") : "None"}`,
            "-".repeat(60)
        );
    });

    return lines.join("\n");
}

async function promptStations(): Promise<TrainSearchQuery> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    try {
        console.log("Train Search Tool");
        console.log("=".repeat(50));

        const srcName = (await rl.question("Enter source station name (e.g., Howrah Jn): ")).trim();
        const srcCode = (await rl.question("Enter source station code (e.g., HWH): ")).trim().toUpperCase();
        const dstName = (await rl.question("Enter destination station name (e.g., Chittaranjan): ")).trim();
        const dstCode = (await rl.question("Enter destination station code (e.g., CRJ): ")).trim().toUpperCase();

        return {
            source: { name: srcName, code: srcCode },
            destination: { name: dstName, code: dstCode },
        };
    } finally {
        rl.close();
    }
}

async function main(): Promise<number> {
    const outputJson = parseOutputArg(process.argv.slice(2));
    const query = await promptStations();

    if (!query.source.name || !query.source.code || !query.destination.name || !query.destination.code) {
        console.error("\n❌ All four station fields are required.");
        return 1;
    }

    const searchService = createTrainSearchService(getAppConfig());
    const outcome = await searchService.searchTrains(query, { outputJson });

    if (outcome.status === "invalid_stations") {
        console.error(`\n❌ ${outcome.message}`);
        return 1;
    }

    if (outcome.status === "no_trains") {
        console.log(`\n❌ ${outcome.message}`);
        return 0;
    }

    console.log(formatTrainList(outcome.policy, outcome.trains));
    console.log(`\n✅ Successfully found ${outcome.trains.length} next trains.`);
    console.log(`📄 Data saved to: ${outputJson}`);
    return 0;
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(`\n❌ An error occurred: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        });
}
