import yaml from "js-yaml";

export type TemplateVariables = Record<string, string>;

export class VariablesFileError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "VariablesFileError";
    }
}

/**
 * Reads a flat object of string values. JSON is accepted as it is valid
 * YAML; an empty file yields no variables.
 */
export function parseVariables(
    content: string,
    fileName: string = "variables",
): TemplateVariables {
    let data: unknown;
    try {
        data = yaml.load(content);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new VariablesFileError(`Could not read ${fileName}: ${reason}`);
    }

    if (data === undefined || data === null) return {};
    if (typeof data !== "object" || Array.isArray(data)) {
        throw new VariablesFileError(
            `${fileName} must contain an object of name/value pairs`,
        );
    }

    const variables: TemplateVariables = {};
    const entries: [string, unknown][] = Object.entries(data);
    for (const [name, value] of entries) {
        if (typeof value !== "string") {
            throw new VariablesFileError(
                `Variable '${name}' in ${fileName} must be a string`,
            );
        }
        variables[name] = value;
    }
    return variables;
}
