import { describe, expect, it } from "vitest";
import { runCli, type CliIO } from "./cli.js";

interface FakeIO extends CliIO {
  out: string;
  err: string;
}

function fakeIO(files: Record<string, string>, stdin = ""): FakeIO {
  const io: FakeIO = {
    out: "",
    err: "",
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    },
    readStdin: async () => stdin,
    stdout: (text) => {
      io.out += text;
    },
    stderr: (text) => {
      io.err += text;
    },
  };
  return io;
}

const outline = [
  'r - - "Total @= std.math.sum(children.meta.count)"',
  'a r count=3; "A"',
  'b r count=4; "B"',
  "",
].join("\n");

function counterIds(): () => string {
  let n = 0;
  return () => `n${++n}`;
}

describe("runCli", () => {
  it("should evaluate and print indented text", async () => {
    const io = fakeIO({ "o.txt": outline });
    expect(await runCli(["eval", "--file", "o.txt", "--to", "text"], io)).toBe(0);
    expect(io.out).toBe("Total 7\n  A\n  B\n");
    expect(io.err).toBe("");
  });

  it("should read stdin when no file is given", async () => {
    const io = fakeIO({}, outline);
    expect(await runCli(["show", "r"], io)).toBe(0);
    expect(io.out).toBe("Total 7\n");
  });

  it("should insert a node and print the outline", async () => {
    const io = fakeIO({ "o.txt": outline });
    const code = await runCli(["insert", "a", "Child", "-f", "o.txt"], io, { createId: counterIds() });
    expect(code).toBe(0);
    expect(io.out).toBe(outline.replace('"A"\n', '"A"\nn1 a - "Child"\n'));
    expect(io.err).toBe("created n1\n");
  });

  it("should convert lines to a JSON snapshot", async () => {
    const io = fakeIO({ "o.txt": 'x - k=@x; "self"\n' });
    expect(await runCli(["eval", "-f", "o.txt", "--to", "json"], io)).toBe(0);
    expect(JSON.parse(io.out)).toEqual({
      version: 1,
      nodes: [{ id: "x", parent: null, text: "self", meta: { k: { ref: "x" } }, required: [] }],
    });
  });

  it("should report script problems on stderr and still succeed", async () => {
    const io = fakeIO({ "o.txt": 'x - - "Bad @= 1 / 0"\n' });
    expect(await runCli(["eval", "-f", "o.txt", "--to", "text"], io)).toBe(0);
    expect(io.out).toBe("Bad #ERROR\n");
    expect(io.err).toBe("error OC_SCRIPT_DIV_ZERO [x]: Division by zero\n");
  });

  it("should expand templates from a file", async () => {
    const io = fakeIO({
      "o.txt": 'r - - "Root"\n',
      "t.json": JSON.stringify({ id: "todo", root: { text: "Todo", fields: [{ key: "done", type: "boolean", default: false }] } }),
    });
    const code = await runCli(["expand", "todo", "r", "-f", "o.txt", "--templates", "t.json"], io, {
      createId: counterIds(),
    });
    expect(code).toBe(0);
    expect(io.out).toBe('r - - "Root"\nn1 r done=F; "Todo"\n');
  });

  it("should print a fresh id", async () => {
    const io = fakeIO({});
    expect(await runCli(["new-id"], io, { createId: () => "fixed-id" })).toBe(0);
    expect(io.out).toBe("fixed-id\n");
  });

  it("should exit 1 with line diagnostics for a bad outline", async () => {
    const io = fakeIO({ "o.txt": "oops\n" });
    expect(await runCli(["eval", "-f", "o.txt"], io)).toBe(1);
    expect(io.err).toBe("error OC_FORMAT_LINE (line 1): Expected a single space\n");
  });

  it("should exit 2 on usage errors", async () => {
    const unknown = fakeIO({}, "");
    expect(await runCli(["frobnicate"], unknown)).toBe(2);
    expect(unknown.err.startsWith("Unknown command: frobnicate\n")).toBe(true);

    const badFlag = fakeIO({});
    expect(await runCli(["eval", "--bogus"], badFlag)).toBe(2);

    const missing = fakeIO({});
    expect(await runCli([], missing)).toBe(2);
  });

  it("should reject unknown config keys", async () => {
    const io = fakeIO({ "c.json": '{"colour":"blue"}' });
    expect(await runCli(["new-id", "--config", "c.json"], io)).toBe(1);
    expect(io.err).toBe("error CONFIG_INVALID: Unknown config key: colour\n");
  });
});
