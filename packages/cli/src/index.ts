#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { runCheck } from "./commands/check";

yargs(hideBin(process.argv))
    .scriptName("weft")
    .usage("$0 <cmd> [args]")
    .command(
        "check <file>",
        "Parse a template and report its diagnostics",
        (yargs) => {
            return yargs
                .positional("file", {
                    describe: "Template to check",
                    type: "string",
                    demandOption: true,
                })
                .option("vars", {
                    describe: "JSON or YAML file of template variables",
                    type: "string",
                })
                .option("ast", {
                    describe: "Print the syntax tree",
                    type: "boolean",
                    default: false,
                })
                .option("symbols", {
                    describe: "Print the symbol table",
                    type: "boolean",
                    default: false,
                });
        },
        async (argv) => {
            process.exitCode = await runCheck(argv);
        },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(chalk.red("weft failed:"), e instanceof Error ? e.message : e);
        process.exitCode = 1;
    });
