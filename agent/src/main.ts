#!/usr/bin/env tsx
import { hexcastLogger } from "@hexcast/core";
import { runCli } from "./index";

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        hexcastLogger.fatal({ err: error }, "Unhandled error in runCli");
        process.exit(1);
    });
