import chalk from "chalk";
import * as fs from "fs/promises";
import * as path from "path";
import {
    compileTemplate,
    findUnresolvedVariables,
    printTree,
} from "@weft/core";
import { parseVariables, TemplateVariables } from "../config/variables";

export interface CheckOptions {
    fileName: string;
    variables?: TemplateVariables;
    ast?: boolean;
    symbols?: boolean;
}

/**
 * Compiles one template and reports on it. Returns the process exit code:
 * 0 when the template can go to generation, 1 otherwise.
 */
export function checkSource(source: string, options: CheckOptions): number {
    const { fileName } = options;
    const result = compileTemplate(source, { variables: options.variables });

    result.diagnostics.printMessages();

    if (result.status === "aborted") {
        console.error(result.error.format(source));
        console.error(chalk.red(`Could not compile ${fileName}`));
        return 1;
    }

    if (result.status === "invalid") {
        const count = result.diagnostics.errorCount;
        console.error(
            chalk.red(`Found ${count} error${count === 1 ? "" : "s"} in ${fileName}.`),
        );
        return 1;
    }

    for (const name of findUnresolvedVariables(result.template, result.symbols)) {
        console.warn(chalk.yellow(`Variable '${name}' is not defined`));
    }

    if (options.ast) {
        console.log(printTree(result.template));
    }

    if (options.symbols) {
        console.log(chalk.bold(`Symbols (${result.symbols.size}):`));
        for (const symbol of result.symbols) {
            console.log(
                `${chalk.gray(symbol.scope)} ${symbol.name}: ${symbol.type} = ${symbol.value}`,
            );
        }
    }

    console.log(chalk.green(`${fileName} is ready for generation.`));
    return 0;
}

export interface CheckFileOptions {
    file: string;
    vars?: string;
    ast?: boolean;
    symbols?: boolean;
}

export async function runCheck(options: CheckFileOptions): Promise<number> {
    const templatePath = path.resolve(options.file);

    try {
        const source = await fs.readFile(templatePath, "utf-8");

        let variables: TemplateVariables | undefined;
        if (options.vars) {
            const varsPath = path.resolve(options.vars);
            const content = await fs.readFile(varsPath, "utf-8");
            variables = parseVariables(content, path.basename(varsPath));
        }

        return checkSource(source, {
            fileName: path.basename(templatePath),
            variables,
            ast: options.ast,
            symbols: options.symbols,
        });
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        console.error(chalk.red(`Error in ${templatePath}: `), reason);
        return 1;
    }
}
