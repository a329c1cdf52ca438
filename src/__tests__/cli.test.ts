import { USAGE, main, parseCliArgs } from "../cli";
import { ConfigError } from "../util/errors";

describe("parseCliArgs", () => {
  test("no arguments prints help", () => {
    expect(parseCliArgs([])).toEqual({ command: "help" });
    expect(parseCliArgs(["--help"])).toEqual({ command: "help" });
  });

  test("run with flags", () => {
    expect(parseCliArgs(["run", "scenario.toml"])).toEqual({
      command: "run",
      scenarioPath: "scenario.toml",
      showLogs: false,
      serveOnly: false,
    });
    expect(
      parseCliArgs(["run", "scenario.toml", "--serve-only", "--show-logs"])
    ).toEqual({
      command: "run",
      scenarioPath: "scenario.toml",
      showLogs: true,
      serveOnly: true,
    });
  });

  test("serve defaults per role", () => {
    expect(parseCliArgs(["serve", "research"])).toEqual({
      command: "serve",
      role: "research",
      host: "127.0.0.1",
      port: 9119,
    });
    expect(parseCliArgs(["serve", "evaluator"])).toMatchObject({
      host: "127.0.0.1",
      port: 9109,
    });
  });

  test("serve options override the defaults", () => {
    expect(
      parseCliArgs([
        "serve",
        "evaluator",
        "--port",
        "9200",
        "--host",
        "0.0.0.0",
        "--card-url",
        "http://evaluator.test/",
      ])
    ).toEqual({
      command: "serve",
      role: "evaluator",
      host: "0.0.0.0",
      port: 9200,
      cardUrl: "http://evaluator.test/",
    });
  });

  test.each([
    [["run"], "Missing argument for run"],
    [["run", "s.toml", "--bogus"], "Unknown option: --bogus"],
    [["serve", "judge"], "Unknown agent role: judge (expected research or evaluator)"],
    [["serve", "research", "--port"], "Missing value for --port"],
    [["serve", "research", "--port", "abc"], "Invalid port: abc"],
    [["serve", "research", "--verbose", "1"], "Unknown option: --verbose"],
    [["deploy", "x"], "Unknown command: deploy"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(ConfigError);
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});

describe("main", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("help prints usage and exits 0", async () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    await expect(main(["help"])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  test("a missing scenario file is a configuration error", async () => {
    await expect(main(["run", "/nonexistent/scenario.toml"])).rejects.toBeInstanceOf(
      ConfigError
    );
  });
});
