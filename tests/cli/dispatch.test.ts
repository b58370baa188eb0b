import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { dispatch } from "../../src/cli/index.js";
import { ShortcutStore } from "../../src/shortcuts.js";
import { FakeRunner } from "./fake-runner.js";

describe("dispatch", () => {
  let tmpDir: string;
  let store: ShortcutStore;
  let runner: FakeRunner;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const cli = (argv: string[], withRunner: FakeRunner = runner) =>
    dispatch(argv, { store, runner: withRunner, cwd: tmpDir });

  const logged = () => logSpy.mock.calls.map((call) => call[0]);
  const errors = () => errorSpy.mock.calls.map((call) => call[0]);

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "projexts-cli-test-"));
    store = new ShortcutStore(join(tmpDir, "home", "shortcuts.json"));
    runner = new FakeRunner();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("add / run", () => {
    it("should run an added shortcut with its stored args", async () => {
      expect(await cli(["add", "build", "--", "echo", "hello"])).toBe(0);
      expect(logged()).toEqual(["✓ Added: build -> echo hello"]);

      expect(await cli(["run", "build"])).toBe(0);
      expect(runner.runs).toEqual([{ command: "echo", args: ["hello"], options: {} }]);
    });

    it("should split a quoted command line", async () => {
      await cli(["add", "dev", "npm run dev"]);
      expect(store.get("dev")).toEqual({ name: "dev", command: "npm", args: ["run", "dev"] });
    });

    it("should keep a single command after -- verbatim", async () => {
      await cli(["add", "app", "--", "/opt/My App/run.sh"]);
      await cli(["run", "app"]);

      expect(runner.runs).toEqual([{ command: "/opt/My App/run.sh", args: [], options: {} }]);
    });

    it("should store --debug after -- as a command argument", async () => {
      await cli(["add", "srv", "--", "node", "server.js", "--debug"]);
      await cli(["run", "srv", "--", "--debug"]);

      expect(store.get("srv").args).toEqual(["server.js", "--debug"]);
      expect(runner.runs[0].args).toEqual(["server.js", "--debug", "--debug"]);
    });

    it("should reject unknown flags instead of dropping arguments", async () => {
      await cli(["add", "build", "--", "make"]);

      expect(await cli(["run", "build", "--port", "3000"])).toBe(2);
      expect(runner.runs).toEqual([]);
      expect(errors()).toEqual(['Error: Unknown flag: --port. Pass command arguments after "--".']);
    });

    it("should report unknown flags as JSON with --json", async () => {
      expect(await cli(["--json", "add", "web", "--force", "npm"])).toBe(2);
      expect(logged()).toEqual(['{"error":"Unknown flag: --force. Pass command arguments after \\"--\\"."}']);
    });

    it("should fail with not found before spawning anything", async () => {
      expect(await cli(["run", "missing"])).toBe(1);
      expect(runner.runs).toEqual([]);
      expect(errors()).toEqual(["Error: No shortcut found with name 'missing'"]);
    });

    it("should append extra args after the stored ones", async () => {
      await cli(["add", "test", "--", "npm", "test"]);
      await cli(["run", "test", "--", "--watch", "src"]);

      expect(runner.runs[0]).toEqual({ command: "npm", args: ["test", "--watch", "src"], options: {} });
    });

    it("should forward the child's exit code", async () => {
      const failing = new FakeRunner([3]);
      await cli(["add", "lint", "--", "eslint", "."]);

      expect(await cli(["run", "lint"], failing)).toBe(3);
    });

    it("should run inside the stored directory", async () => {
      await cli(["add", "web", "--dir", "site", "--", "npm", "start"]);
      await cli(["run", "web"]);

      expect(runner.runs[0].options).toEqual({ cwd: join(tmpDir, "site") });
    });

    it("should report spawn failures", async () => {
      const broken = new FakeRunner([], ["nope"]);
      await cli(["add", "bad", "--", "nope"]);

      expect(await cli(["run", "bad"], broken)).toBe(1);
      expect(errors()).toContain("Error: Execution failed: spawn nope ENOENT");
    });

    it("should print the command about to run", async () => {
      await cli(["add", "build", "--", "make", "all"]);
      await cli(["run", "build", "--", "-j4"]);

      expect(errors()).toEqual(["→ Running command: make all -j4"]);
    });

    it("should reject a duplicate name", async () => {
      await cli(["add", "build", "--", "make"]);

      expect(await cli(["add", "build", "--", "npm", "run", "build"])).toBe(1);
      expect(errors()).toEqual(["Error: Shortcut 'build' already exists"]);
      expect(store.get("build").command).toBe("make");
    });

    it("should require a command", async () => {
      expect(await cli(["add", "build"])).toBe(2);
      expect(errors()).toEqual(["Error: Usage: projexts add <name> [--dir <path>] -- <command> [args...]"]);
    });

    it("should require a value for --dir", async () => {
      expect(await cli(["add", "web", "--dir", "--", "npm", "start"])).toBe(2);
      expect(errors()).toEqual(["Error: --dir needs a path"]);
    });
  });

  describe("update / remove / reset", () => {
    it("should update an existing shortcut", async () => {
      await cli(["add", "build", "--", "make"]);

      expect(await cli(["update", "build", "--", "make", "all"])).toBe(0);
      expect(store.get("build")).toEqual({ name: "build", command: "make", args: ["all"] });
      expect(logged()).toContain("✓ Updated: build -> make all");
    });

    it("should fail to update a missing shortcut", async () => {
      expect(await cli(["update", "ghost", "--", "true"])).toBe(1);
      expect(store.list()).toEqual([]);
    });

    it("should remove a shortcut", async () => {
      await cli(["add", "build", "--", "make"]);

      expect(await cli(["remove", "build"])).toBe(0);
      expect(logged()).toContain("✓ Removed shortcut: build");
      expect(await cli(["run", "build"])).toBe(1);
    });

    it("should accept rm as an alias", async () => {
      await cli(["add", "build", "--", "make"]);
      expect(await cli(["rm", "build"])).toBe(0);
      expect(store.has("build")).toBe(false);
    });

    it("should reset repeatedly without failing", async () => {
      await cli(["add", "build", "--", "make"]);

      expect(await cli(["reset"])).toBe(0);
      expect(await cli(["reset"])).toBe(0);
      expect(store.list()).toEqual([]);
    });
  });

  describe("list / show", () => {
    it("should print one line per shortcut", async () => {
      await cli(["add", "build", "--", "npm", "run", "build"]);
      await cli(["add", "web", "--dir", "/code/web", "--", "npm", "start"]);
      logSpy.mockClear();

      expect(await cli(["list"])).toBe(0);
      expect(logged()).toEqual(["build: npm run build", "web:   npm start  (/code/web)"]);
    });

    it("should say when there are no shortcuts", async () => {
      await cli(["list"]);
      expect(logged()).toEqual(["No shortcuts found"]);
    });

    it("should print JSON with --json", async () => {
      await cli(["add", "build", "--", "make"]);
      logSpy.mockClear();

      await cli(["list", "--json"]);
      expect(logged()).toEqual(['{"shortcuts":[{"name":"build","command":"make","args":[]}]}']);
    });

    it("should show one shortcut", async () => {
      await cli(["add", "build", "--", "make", "all"]);
      logSpy.mockClear();

      expect(await cli(["show", "build"])).toBe(0);
      expect(logged()).toEqual(["  Name:     build", "  Command:  make", "  Args:     all"]);
    });
  });

  describe("open / open-file / git-push", () => {
    let projectDir: string;

    beforeEach(async () => {
      projectDir = join(tmpDir, "proj");
      mkdirSync(projectDir);
      writeFileSync(join(projectDir, "b.txt"), "");
      writeFileSync(join(projectDir, "a.txt"), "");
      await cli(["add", "proj", "--", "code", projectDir]);
    });

    it("should open the project folder", async () => {
      expect(await cli(["open", "proj"])).toBe(0);
      expect(runner.opened).toEqual([projectDir]);
    });

    it("should open the first file in the folder", async () => {
      expect(await cli(["open-file", "proj"])).toBe(0);
      expect(runner.opened).toEqual([join(projectDir, "a.txt")]);
    });

    it("should fail to open a shortcut without a folder", async () => {
      await cli(["add", "hello", "--", "echo", "hello"]);

      expect(await cli(["open", "hello"])).toBe(1);
      expect(runner.opened).toEqual([]);
      expect(errors()).toEqual(["Error: No directory associated with shortcut 'hello'"]);
    });

    it("should add, commit and push in the project folder", async () => {
      expect(await cli(["git-push", "proj", "fix header"])).toBe(0);

      expect(runner.runs).toEqual([
        { command: "git", args: ["add", "-A"], options: { cwd: projectDir } },
        { command: "git", args: ["commit", "-m", "fix header"], options: { cwd: projectDir } },
        { command: "git", args: ["push"], options: { cwd: projectDir } },
      ]);
    });

    it("should stop at the first failing git step", async () => {
      const failing = new FakeRunner([0, 1]);

      expect(await cli(["git-push", "proj", "wip"], failing)).toBe(1);
      expect(failing.runs.map((r) => r.args[0])).toEqual(["add", "commit"]);
      expect(errors()).toContain("Error: git commit failed with exit code 1");
    });

    it("should require a commit message", async () => {
      expect(await cli(["git-push", "proj"])).toBe(2);
      expect(runner.runs).toEqual([]);
    });
  });

  describe("errors and help", () => {
    it("should reject unknown commands", async () => {
      expect(await cli(["deploy"])).toBe(2);
      expect(errors()).toEqual(['Error: Unknown command: deploy. Run "projexts help" for usage.']);
    });

    it("should not dispatch to object prototype members", async () => {
      expect(await cli(["toString"])).toBe(2);
    });

    it("should report errors as JSON with --json", async () => {
      expect(await cli(["--json", "run", "missing"])).toBe(1);
      expect(logged()).toEqual(['{"error":"No shortcut found with name \'missing\'"}']);
    });

    it("should print usage for help and for no command", async () => {
      expect(await cli(["help"])).toBe(0);
      expect(await cli([])).toBe(0);

      const output = logged();
      expect(output).toHaveLength(2);
      expect(output[0].split("\n")[0]).toBe("Usage: projexts <command> [args] [flags]");
    });
  });
});
