import { describe, it, expect } from "vitest";
import { parseConfig } from "../../../src/config/parser.js";
import { ConfigError } from "../../../src/utils/errors.js";

describe("parseConfig", () => {
  it("defaults to correcting with a 30ms budget", () => {
    expect(parseConfig(["--text", "call the api"], {})).toEqual({
      config: {
        glossaryPath: undefined,
        budgetMs: 30,
        debug: false,
        collapseLetterSpacing: true,
      },
      command: { kind: "correct", text: "call the api" },
    });
  });

  it("reads defaults from the environment", () => {
    const { config, command } = parseConfig([], {
      VOCAB_CONFIG: "/tmp/vocab.json",
      VOCAB_BUDGET_MS: "50",
      DEBUG: "1",
    });

    expect(config.glossaryPath).toBe("/tmp/vocab.json");
    expect(config.budgetMs).toBe(50);
    expect(config.debug).toBe(true);
    expect(command).toEqual({ kind: "correct", text: undefined });
  });

  it("lets arguments override the environment", () => {
    const { config } = parseConfig(["-c", "local.jsonc", "--budget", "5"], {
      VOCAB_CONFIG: "/tmp/vocab.json",
      VOCAB_BUDGET_MS: "50",
    });

    expect(config.glossaryPath).toBe("local.jsonc");
    expect(config.budgetMs).toBe(5);
  });

  it("parses term additions with repeated aliases", () => {
    const { command } = parseConfig(
      ["--add", "Kubernetes", "--alias", "cube ernetes", "--alias", "k eights", "--case", "exact"],
      {}
    );

    expect(command).toEqual({
      kind: "add",
      canonical: "Kubernetes",
      aliases: ["cube ernetes", "k eights"],
      caseMode: "exact",
    });
  });

  it("parses the other commands", () => {
    expect(parseConfig(["--remove", "API"], {}).command).toEqual({ kind: "remove", canonical: "API" });
    expect(parseConfig(["--list"], {}).command).toEqual({ kind: "list" });
    expect(parseConfig(["--lint"], {}).command).toEqual({ kind: "lint" });
  });

  it("turns off letter-spacing collapse", () => {
    expect(parseConfig(["--no-letter-spacing"], {}).config.collapseLetterSpacing).toBe(false);
  });

  it("rejects unknown case modes", () => {
    expect(() => parseConfig(["--add", "X", "--case", "title"], {})).toThrow(ConfigError);
  });

  it("rejects invalid budgets", () => {
    expect(() => parseConfig(["--budget=-1"], {})).toThrow(ConfigError);
    expect(() => parseConfig(["--budget", "soon"], {})).toThrow(/Invalid budget "soon"/);
  });
});
