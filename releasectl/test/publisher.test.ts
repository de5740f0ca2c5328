import { describe, expect, it } from "vitest";
import { createLogger } from "../src/logging/logger.js";
import { parseHostPort, shellQuote, type RemoteTarget } from "../src/remote/commands.js";
import { RemotePublisher, aliasNameFor } from "../src/remote/publisher.js";
import { FakeRunner, failWhen, type RecordedCall } from "./fake-runner.js";

const logger = createLogger({ silent: true });

const target: RemoteTarget = {
  host: "files.example",
  port: "2222",
  user: "deploy",
  baseDir: "/srv/www/",
  downloadsDir: "downloads",
};

const request = {
  version: "0.2.0",
  localDir: "/tmp/stage/0.2.0",
  files: ["client-0.2.0.zip", "server-0.2.0.zip"],
  manifestPath: "releases.json",
};

const EXPECTED_CALLS: RecordedCall[] = [
  { command: "ssh", args: ["-p", "2222", "deploy@files.example", "mkdir -p '/srv/www/downloads/0.2.0'"] },
  { command: "scp", args: ["-P", "2222", "/tmp/stage/0.2.0/client-0.2.0.zip", "deploy@files.example:/srv/www/downloads/0.2.0"] },
  { command: "scp", args: ["-P", "2222", "/tmp/stage/0.2.0/server-0.2.0.zip", "deploy@files.example:/srv/www/downloads/0.2.0"] },
  { command: "scp", args: ["-P", "2222", "releases.json", "deploy@files.example:/srv/www/"] },
  {
    command: "ssh",
    args: [
      "-p",
      "2222",
      "deploy@files.example",
      "ln -sfn '/srv/www/downloads/0.2.0/client-0.2.0.zip' '/srv/www/downloads/client-latest.zip'",
    ],
  },
  {
    command: "ssh",
    args: [
      "-p",
      "2222",
      "deploy@files.example",
      "ln -sfn '/srv/www/downloads/0.2.0/server-0.2.0.zip' '/srv/www/downloads/server-latest.zip'",
    ],
  },
];

describe("remote publisher", () => {
  it("runs mkdir, transfers, manifest upload and alias updates in order", async () => {
    const runner = new FakeRunner();
    const report = await new RemotePublisher(target, runner, logger).publish(request);

    expect(runner.calls).toEqual(EXPECTED_CALLS);
    expect(report).toEqual({
      remoteVersionDir: "/srv/www/downloads/0.2.0",
      transferred: ["client-0.2.0.zip", "server-0.2.0.zip"],
      aliases: [
        { alias: "/srv/www/downloads/client-latest.zip", target: "/srv/www/downloads/0.2.0/client-0.2.0.zip" },
        { alias: "/srv/www/downloads/server-latest.zip", target: "/srv/www/downloads/0.2.0/server-0.2.0.zip" },
      ],
    });
  });

  it("omits port flags when no port is configured", async () => {
    const runner = new FakeRunner();
    await new RemotePublisher({ ...target, port: undefined }, runner, logger).publish({ ...request, files: ["client-0.2.0.zip"] });

    expect(runner.calls[0]).toEqual({ command: "ssh", args: ["deploy@files.example", "mkdir -p '/srv/www/downloads/0.2.0'"] });
    expect(runner.calls[1].args).toEqual(["/tmp/stage/0.2.0/client-0.2.0.zip", "deploy@files.example:/srv/www/downloads/0.2.0"]);
  });

  it("stops with RemoteDirError when the directory cannot be created", async () => {
    const runner = failWhen((c) => c.args.some((a) => a.startsWith("mkdir -p")));
    await expect(new RemotePublisher(target, runner, logger).publish(request)).rejects.toMatchObject({
      code: "RemoteDirError",
      details: { path: "/srv/www/downloads/0.2.0", exitCode: 1 },
    });
    expect(runner.calls).toHaveLength(1);
  });

  it("aborts remaining transfers on the first failed transfer and keeps earlier ones", async () => {
    const runner = failWhen((c) => c.command === "scp" && c.args.some((a) => a.endsWith("server-0.2.0.zip")));
    await expect(new RemotePublisher(target, runner, logger).publish(request)).rejects.toMatchObject({
      code: "TransferError",
      details: { file: "server-0.2.0.zip" },
    });
    expect(runner.calls).toEqual(EXPECTED_CALLS.slice(0, 3));
  });

  it("fails with TransferError when the manifest upload fails and updates no aliases", async () => {
    const runner = failWhen((c) => c.args.includes("releases.json"));
    await expect(new RemotePublisher(target, runner, logger).publish(request)).rejects.toMatchObject({
      code: "TransferError",
      details: { path: "releases.json" },
    });
    expect(runner.calls).toEqual(EXPECTED_CALLS.slice(0, 4));
  });

  it("fails with AliasUpdateError on the first failed alias, keeping prior work", async () => {
    const runner = failWhen((c) => c.args.some((a) => a.startsWith("ln -sfn")));
    await expect(new RemotePublisher(target, runner, logger).publish(request)).rejects.toMatchObject({
      code: "AliasUpdateError",
      details: { file: "client-0.2.0.zip", path: "/srv/www/downloads/client-latest.zip" },
    });
    expect(runner.calls).toEqual(EXPECTED_CALLS.slice(0, 5));
  });

  it("reports a transport that cannot be started", async () => {
    const runner = new FakeRunner(() => new Error("spawn ssh ENOENT"));
    await expect(new RemotePublisher(target, runner, logger).publish(request)).rejects.toThrow(
      /could not start ssh: spawn ssh ENOENT/,
    );
  });

  it("is repeatable: a second publish issues the same commands", async () => {
    const runner = new FakeRunner();
    const publisher = new RemotePublisher(target, runner, logger);
    await publisher.publish(request);
    await publisher.publish(request);
    expect(runner.calls).toEqual([...EXPECTED_CALLS, ...EXPECTED_CALLS]);
  });

  it("roots the downloads directory at / when the base is /", () => {
    const publisher = new RemotePublisher({ ...target, baseDir: "/" }, new FakeRunner(), logger);
    expect(publisher.remoteDownloadsDir()).toBe("/downloads");
    expect(publisher.remoteVersionDir("1.0.0")).toBe("/downloads/1.0.0");
  });
});

describe("aliasNameFor", () => {
  it("replaces the version with latest", () => {
    expect(aliasNameFor("client-1.0.0.zip", "1.0.0")).toBe("client-latest.zip");
    expect(aliasNameFor("app-1.0.0-rc.1.zip", "1.0.0-rc.1")).toBe("app-latest.zip");
    expect(aliasNameFor("my-tool-2.3.4.ZIP", "2.3.4")).toBe("my-tool-latest.ZIP");
  });

  it("rejects names without the version suffix", () => {
    expect(() => aliasNameFor("client.zip", "1.0.0")).toThrow(/Cannot derive alias/);
    expect(() => aliasNameFor("-1.0.0.zip", "1.0.0")).toThrow(/Cannot derive alias/);
  });
});

describe("remote command helpers", () => {
  it("parses host and optional port", () => {
    expect(parseHostPort("files.example:2222")).toEqual({ host: "files.example", port: "2222" });
    expect(parseHostPort("files.example")).toEqual({ host: "files.example" });
  });

  it("single-quotes shell arguments", () => {
    expect(shellQuote("/srv/www")).toBe("'/srv/www'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});
