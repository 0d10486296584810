#!/usr/bin/env node

import * as fs from "fs";
import { createInterface } from "readline/promises";
import chalk from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import { config, validateConfig } from "./config";
import { createManager } from "./context";
import { startApi } from "./api";
import { bulkHealthCheck } from "./health";
import { errorMessage } from "./logger";
import { ProfileManager } from "./manager";
import { PROXY_TYPES, Profile } from "./types";

const program = new Command();

program
  .name("wpm")
  .description("Manage wireproxy processes for WireGuard profiles")
  .version("1.0.0");

/** Build the manager, run `fn`, print failures the way every command does. */
function withManager<A extends unknown[]>(
  fn: (manager: ProfileManager, ...args: A) => Promise<void> | void
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      validateConfig();
      await fn(createManager(), ...args);
    } catch (err) {
      console.error(chalk.red("Error:"), errorMessage(err));
      process.exit(1);
    }
  };
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function readInput(source: string): Promise<string> {
  if (source !== "-") {
    return fs.readFileSync(source, "utf8");
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return false;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return answer.trim().toLowerCase().startsWith("y");
  } finally {
    rl.close();
  }
}

program
  .command("ls")
  .alias("list")
  .description("List profiles with their port and status")
  .option("--json", "Output as JSON")
  .action(
    withManager((manager: ProfileManager, options: { json?: boolean }) => {
      const profiles = manager.list();

      if (options.json) {
        console.log(JSON.stringify(profiles, null, 2));
        return;
      }
      if (profiles.length === 0) {
        console.log(chalk.yellow(`No profiles found in ${config.profilesDir}`));
        return;
      }

      const table = new Table({
        head: ["Name", "Port", "Last Port", "Host", "PID", "Status"],
        style: { head: ["cyan"] },
      });

      for (const profile of profiles) {
        table.push([
          profile.name,
          profile.proxyPort ?? "-",
          profile.lastPort ?? "-",
          profile.host ?? "-",
          profile.pid ?? "-",
          profile.running ? chalk.green("running") : chalk.gray("stopped"),
        ]);
      }

      const running = profiles.filter((p) => p.running).length;
      console.log(table.toString());
      console.log(
        chalk.gray(`\nTotal: ${profiles.length} profiles (${chalk.green(running)} running)`)
      );
    })
  );

program
  .command("add <files...>")
  .description("Import WireGuard .conf files")
  .action(
    withManager((manager: ProfileManager, files: string[]) => {
      let failed = 0;
      for (const file of files) {
        try {
          const profile = manager.importFile(file);
          console.log(chalk.green(`✓ Imported '${profile.name}'`));
        } catch (err) {
          failed++;
          console.log(chalk.red(`✗ ${file}: ${errorMessage(err)}`));
        }
      }
      if (failed > 0) {
        process.exitCode = 1;
      }
    })
  );

program
  .command("add-text <name> <source>")
  .description("Import config text from a file, or '-' for stdin")
  .action(
    withManager(async (manager: ProfileManager, name: string, source: string) => {
      const profile = manager.importText(name, await readInput(source));
      console.log(chalk.green(`✓ Imported '${profile.name}'`));
    })
  );

program
  .command("add-url <url>")
  .description("Download and import a config")
  .action(
    withManager(async (manager: ProfileManager, url: string) => {
      console.log(chalk.yellow(`Downloading ${url}...`));
      const profile = await manager.importUrl(url);
      console.log(chalk.green(`✓ Imported '${profile.name}'`));
    })
  );

program
  .command("rm <name>")
  .alias("remove")
  .description("Delete a profile and its config file")
  .action(
    withManager(async (manager: ProfileManager, name: string) => {
      await manager.delete(name);
      console.log(chalk.green(`Profile '${name}' removed`));
    })
  );

program
  .command("edit <name>")
  .description("Rename a profile or replace its config text")
  .option("--rename <newName>", "New profile name")
  .option("--content <file>", "Replacement config file, or '-' for stdin")
  .action(
    withManager(async (manager: ProfileManager, name: string, options: { rename?: string; content?: string }) => {
      const content = options.content !== undefined ? await readInput(options.content) : undefined;
      const profile = manager.update(name, options.rename ?? name, content);
      console.log(chalk.green(`Profile '${profile.name}' updated`));
    })
  );

program
  .command("relink <name> <file>")
  .description("Replace a missing config file with a copy of another")
  .action(
    withManager((manager: ProfileManager, name: string, file: string) => {
      const profile = manager.relink(name, file);
      console.log(chalk.green(`Profile '${name}' now uses ${profile.confPath}`));
    })
  );

program
  .command("connect <name>")
  .description("Start wireproxy for a profile")
  .option("--port <port>", "Bind to this port")
  .option("--force", "Stop any profile holding the port without asking")
  .action(
    withManager(async (manager: ProfileManager, name: string, options: { port?: string; force?: boolean }) => {
      const result = await manager.connect(name, {
        port: options.port !== undefined ? parsePort(options.port) : undefined,
        confirmOverride: (holder: Profile) =>
          options.force === true ||
          confirm(`Port ${holder.proxyPort} is used by '${holder.name}'. Stop it?`),
      });
      console.log(chalk.green(`✓ '${result.name}' listening on 127.0.0.1:${result.port} (pid ${result.pid})`));
    })
  );

program
  .command("disconnect <name>")
  .description("Stop wireproxy for a profile")
  .action(
    withManager(async (manager: ProfileManager, name: string) => {
      await manager.disconnect(name);
      console.log(chalk.green(`'${name}' disconnected`));
    })
  );

program
  .command("toggle <name>")
  .description("Connect a stopped profile or disconnect a running one")
  .action(
    withManager(async (manager: ProfileManager, name: string) => {
      const result = await manager.toggle(name);
      if (result) {
        console.log(chalk.green(`✓ '${name}' listening on 127.0.0.1:${result.port}`));
      } else {
        console.log(chalk.green(`'${name}' disconnected`));
      }
    })
  );

program
  .command("auto [names...]")
  .description("Connect stopped profiles in parallel up to the port limit")
  .option("--from <name>", "Start at this profile and continue down the list")
  .option("--start-port <port>", "Assign ports in order starting here")
  .action(
    withManager(async (manager: ProfileManager, names: string[], options: { from?: string; startPort?: string }) => {
      const controller = new AbortController();
      const onSigint = () => {
        console.log(chalk.yellow("\nCancelling after in-flight launches finish..."));
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      const unsubscribe = manager.events.on("autoconnect:progress", ({ progress }) => {
        const counter = chalk.gray(`[${progress.attempted}/${progress.total}]`);
        if (progress.ok) {
          console.log(`${counter} ${chalk.green("✓")} ${progress.name}: port ${progress.port}`);
        } else {
          console.log(`${counter} ${chalk.red("✗")} ${progress.name}: ${progress.error}`);
        }
      });

      try {
        const summary = await manager.autoConnect({
          names: names.length > 0 ? names : undefined,
          from: options.from,
          startPort: options.startPort !== undefined ? parsePort(options.startPort) : undefined,
          signal: controller.signal,
        });
        if (!summary) {
          console.log(chalk.yellow("Auto-connect is already running"));
          return;
        }
        if (summary.queued === 0) {
          console.log(chalk.yellow("Nothing to connect"));
          return;
        }
        console.log(
          chalk.gray(
            `\nStarted ${chalk.green(summary.started.length)}, failed ${chalk.red(summary.failed.length)}, ` +
              `skipped ${summary.skipped.length}${summary.cancelled ? " (cancelled)" : ""}`
          )
        );
      } finally {
        unsubscribe();
        process.off("SIGINT", onSigint);
      }
    })
  );

program
  .command("ports")
  .description("Show free ports in the allowed range")
  .action(
    withManager((manager: ProfileManager) => {
      const { allowedRange } = manager.status();
      const ports = manager.availablePorts();
      console.log(chalk.cyan(`Allowed range: ${allowedRange.start}-${allowedRange.end}`));
      console.log(ports.length > 0 ? ports.join(", ") : chalk.yellow("No free ports"));
    })
  );

program
  .command("check [names...]")
  .description("Fetch the exit IP through running profiles")
  .action(
    withManager(async (manager: ProfileManager, names: string[]) => {
      const targets = names.length > 0 ? names : manager.list().filter((p) => p.running).map((p) => p.name);
      if (targets.length === 0) {
        console.log(chalk.yellow("No running profiles"));
        return;
      }

      console.log(chalk.yellow(`Checking ${targets.length} profiles...`));
      const results = await bulkHealthCheck(manager, targets);
      for (const result of results.values()) {
        const where = result.port !== undefined ? `port ${result.port}` : result.name;
        if (result.healthy) {
          console.log(chalk.green(`✓ ${result.name} (${where}): ${result.exitIp}`));
        } else {
          console.log(chalk.red(`✗ ${result.name}: ${result.error}`));
        }
      }
    })
  );

program
  .command("status")
  .description("Show manager status")
  .action(
    withManager((manager: ProfileManager) => {
      const status = manager.status();
      const settings = manager.getSettings();

      console.log(chalk.cyan("wireproxy manager"));
      console.log(chalk.gray("─".repeat(40)));
      console.log(`Profiles: ${status.total}`);
      console.log(`Running: ${chalk.green(status.running)}`);
      console.log(`Port limit: ${status.portLimit === 0 ? "unlimited" : status.portLimit}`);
      console.log(`Allowed range: ${status.allowedRange.start}-${status.allowedRange.end}`);
      console.log(`Proxy type: ${status.proxyType}`);
      console.log(`Executable: ${settings.wireproxyPath ?? chalk.red("not set")}`);
      console.log(`Process logs: ${settings.loggingEnabled ? "on" : "off"}`);
    })
  );

program
  .command("limit <n>")
  .description("Set the maximum number of running profiles (0 = unlimited)")
  .action(
    withManager((manager: ProfileManager, value: string) => {
      const settings = manager.updateSettings({ portLimit: Number(value) });
      const { allowedRange } = manager.status();
      console.log(
        chalk.green(`Port limit set to ${settings.portLimit} (${allowedRange.start}-${allowedRange.end})`)
      );
    })
  );

program
  .command("type <proxyType>")
  .description(`Set the proxy type (${PROXY_TYPES.join(" or ")})`)
  .action(
    withManager((manager: ProfileManager, value: string) => {
      const proxyType = PROXY_TYPES.find((t) => t === value);
      if (!proxyType) {
        throw new Error(`Proxy type must be one of: ${PROXY_TYPES.join(", ")}`);
      }
      const settings = manager.updateSettings({ proxyType });
      console.log(chalk.green(`Proxy type set to ${settings.proxyType}; applies to new connections`));
    })
  );

program
  .command("path [exe]")
  .description("Show or set the wireproxy executable")
  .action(
    withManager(async (manager: ProfileManager, exe: string | undefined) => {
      if (exe !== undefined) {
        manager.updateSettings({ wireproxyPath: exe });
      }
      console.log(await manager.resolveExecutable());
    })
  );

program
  .command("logging <state>")
  .description("Turn per-profile process logs on or off")
  .action(
    withManager((manager: ProfileManager, state: string) => {
      if (state !== "on" && state !== "off") {
        throw new Error("State must be 'on' or 'off'");
      }
      manager.updateSettings({ loggingEnabled: state === "on" });
      console.log(chalk.green(`Process logs ${state}`));
    })
  );

program
  .command("stop-all")
  .description("Disconnect every running profile")
  .action(
    withManager(async (manager: ProfileManager) => {
      const running = manager.list().filter((p) => p.running);
      await manager.shutdown();
      console.log(chalk.green(`Stopped ${running.length} profiles`));
    })
  );

program
  .command("serve")
  .description("Run the REST API in the foreground")
  .option("--port <port>", "Listen port", String(config.restPort))
  .action(
    withManager((manager: ProfileManager, options: { port: string }) => {
      const server = startApi(manager, parsePort(options.port));
      const stop = () => {
        server.close();
        manager
          .shutdown()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            console.error(chalk.red("Error:"), errorMessage(err));
            process.exit(1);
          });
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
    })
  );

void program.parseAsync();
