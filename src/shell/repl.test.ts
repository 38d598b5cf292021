/**
 * Tests for SqlShell
 */

import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { SqlShell, EXIT_SUCCESS, EXIT_INPUT_FAILURE } from "./repl.js";
import { formatHelp } from "../sql/executor.js";
import { createLineStream, createTestTerminal } from "../testing/streams.js";
import type { ProgramMetadata } from "../config/metadata.js";

const metadata: ProgramMetadata = { name: "sqldb", version: "0.1.0" };

function runShell(lines: string[], options: { banner?: boolean; promptName?: string } = {}) {
  const { terminal, getOutput, getErrors } = createTestTerminal();
  const shell = new SqlShell({
    metadata,
    terminal,
    input: createLineStream(lines),
    banner: options.banner ?? false,
    promptName: options.promptName,
    now: () => new Date(2026, 9, 19, 8, 5, 3),
  });
  return { run: () => shell.run(), getOutput, getErrors };
}

describe("SqlShell", () => {
  it("prints help and keeps reading", async () => {
    const shell = runShell([".help", ".exit"]);

    expect(await shell.run()).toBe(EXIT_SUCCESS);
    expect(shell.getOutput()).toBe(`sqldb > ${formatHelp()}\nsqldb > `);
    expect(shell.getErrors()).toBe("");
  });

  it("stops with status 0 on .exit without another prompt", async () => {
    const shell = runShell([".exit", "select 1"]);

    expect(await shell.run()).toBe(EXIT_SUCCESS);
    expect(shell.getOutput()).toBe("sqldb > ");
  });

  it("acknowledges a select and keeps reading", async () => {
    const shell = runShell(["select * from users", ".exit"]);

    expect(await shell.run()).toBe(EXIT_SUCCESS);
    expect(shell.getOutput()).toBe("sqldb > This is where we would do a select.\nsqldb > ");
  });

  it("reports an unknown meta command and keeps reading", async () => {
    const shell = runShell([".frobnicate", ".exit"]);

    expect(await shell.run()).toBe(EXIT_SUCCESS);
    expect(shell.getErrors()).toBe("Unrecognized command: '.frobnicate'.\n");
    expect(shell.getOutput()).toBe("sqldb > sqldb > ");
  });

  it("reports a blank line as an invalid buffer and keeps reading", async () => {
    const shell = runShell(["", ".exit"]);

    expect(await shell.run()).toBe(EXIT_SUCCESS);
    expect(shell.getErrors()).toBe("Invalid input buffer.\n");
  });

  it("stops with status 1 when input ends", async () => {
    const shell = runShell([]);

    expect(await shell.run()).toBe(EXIT_INPUT_FAILURE);
    expect(shell.getOutput()).toBe("sqldb > ");
    expect(shell.getErrors()).toBe("Error reading input\n");
  });

  it("stops with status 1 when input ends after commands", async () => {
    const shell = runShell(["insert 1"]);

    expect(await shell.run()).toBe(EXIT_INPUT_FAILURE);
    expect(shell.getOutput()).toBe("sqldb > This is where we would do an insert.\nsqldb > ");
    expect(shell.getErrors()).toBe("Error reading input\n");
  });

  it("stops with status 1 when the input stream fails", async () => {
    const { terminal, getOutput, getErrors } = createTestTerminal();
    const input = new PassThrough();
    const shell = new SqlShell({ metadata, terminal, input, banner: false });

    const running = shell.run();
    input.write("select 1\n");
    await new Promise((resolve) => setTimeout(resolve, 10));
    input.destroy(new Error("device gone"));

    expect(await running).toBe(EXIT_INPUT_FAILURE);
    expect(getOutput()).toBe("sqldb > This is where we would do a select.\nsqldb > ");
    expect(getErrors()).toBe("Error reading input: device gone\n");
  });

  it("prints the banner before the first prompt", async () => {
    const shell = runShell([".exit"], { banner: true });

    await shell.run();

    expect(shell.getOutput()).toBe(
      [
        "sqldb version 0.1.0 2026-10-19 08:05:03",
        'Enter ".help" for usage hints.',
        "Connected to a transient in-memory database.",
        'Use ".open FILENAME" to reopen on a persistent database.',
        'Enter ".exit" to exit the database.',
        "sqldb > ",
      ].join("\n")
    );
  });

  it("uses a custom prompt name", async () => {
    const shell = runShell([".exit"], { promptName: "db" });

    await shell.run();

    expect(shell.getOutput()).toBe("db > ");
  });
});
