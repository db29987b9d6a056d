import chalk from "chalk";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { checkSource, runCheck } from "../src/commands/check";

let level: typeof chalk.level;
let log: jest.SpyInstance;
let warn: jest.SpyInstance;
let error: jest.SpyInstance;

beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
});

afterAll(() => {
    chalk.level = level;
});

beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => {});
    warn = jest.spyOn(console, "warn").mockImplementation(() => {});
    error = jest.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
    jest.restoreAllMocks();
});

describe("checkSource", () => {
    test("accept a clean template", () => {
        const code = checkSource("h1() -> %title%", {
            fileName: "page.weft",
            variables: { title: "Home" },
        });

        expect(code).toBe(0);
        expect(error).not.toHaveBeenCalled();
        expect(warn).not.toHaveBeenCalled();
        expect(log).toHaveBeenLastCalledWith("page.weft is ready for generation.");
    });

    test("report syntax errors with a summary", () => {
        const code = checkSource("div(class className) -> x", {
            fileName: "page.weft",
        });

        expect(code).toBe(1);
        expect(error).toHaveBeenCalledTimes(2);
        expect(error).toHaveBeenLastCalledWith("Found 1 error in page.weft.");
    });

    test("report a fatal declaration problem", () => {
        const code = checkSource("let x: Int = 1\nlet x: Int = 2", {
            fileName: "page.weft",
        });

        expect(code).toBe(1);
        expect(error).toHaveBeenLastCalledWith("Could not compile page.weft");
    });

    test("warn about variables without a value", () => {
        const code = checkSource("p() -> %missing%", { fileName: "page.weft" });

        expect(code).toBe(0);
        expect(warn).toHaveBeenCalledWith("Variable 'missing' is not defined");
    });

    test("print the tree and symbols on request", () => {
        checkSource("p() -> hi", {
            fileName: "page.weft",
            variables: { title: "Home" },
            ast: true,
            symbols: true,
        });

        expect(log).toHaveBeenCalledWith(
            [
                "Template",
                "  Element",
                '    ElementName "p"',
                "    AttrList",
                "    Contents",
                '      Ident "hi"',
            ].join("\n"),
        );
        expect(log).toHaveBeenCalledWith("Symbols (1):");
        expect(log).toHaveBeenCalledWith("global title: String = Home");
    });
});

describe("runCheck", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "weft-check-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test("check a template file with a variables file", async () => {
        const file = path.join(dir, "page.weft");
        const vars = path.join(dir, "vars.yml");
        await fs.writeFile(file, "h1() -> %title%");
        await fs.writeFile(vars, "title: Home\n");

        const code = await runCheck({ file, vars });

        expect(code).toBe(0);
        expect(warn).not.toHaveBeenCalled();
        expect(log).toHaveBeenLastCalledWith("page.weft is ready for generation.");
    });

    test("fail when the template file is missing", async () => {
        const file = path.join(dir, "missing.weft");

        const code = await runCheck({ file });

        expect(code).toBe(1);
        expect(error).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledWith(
            `Error in ${file}: `,
            expect.stringContaining("ENOENT"),
        );
    });

    test("fail when the variables file is not a mapping", async () => {
        const file = path.join(dir, "page.weft");
        const vars = path.join(dir, "vars.yml");
        await fs.writeFile(file, "h1() -> %title%");
        await fs.writeFile(vars, "- Home\n- About\n");

        const code = await runCheck({ file, vars });

        expect(code).toBe(1);
        expect(log).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledWith(
            `Error in ${file}: `,
            "vars.yml must contain an object of name/value pairs",
        );
    });
});
