#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import process from "node:process";

import { apiFetch } from "./api.js";
import { readConfig, writeConfig } from "./config.js";

function red(s: string) {
  return `\u001b[31m${s}\u001b[0m`;
}
function green(s: string) {
  return `\u001b[32m${s}\u001b[0m`;
}
function dim(s: string) {
  return `\u001b[2m${s}\u001b[0m`;
}

async function requireConfig() {
  const cfg = await readConfig();
  if (!cfg) {
    throw new Error(`Missing config. Run: digest config --url http://localhost:3000 --key <TOKEN>`);
  }
  return cfg;
}

async function call(opts: { path: string; method?: string; body?: unknown }) {
  return apiFetch(await requireConfig(), opts);
}

function print(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

function parseInteger(value: string) {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

function parseRatio(value: string) {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError("Expected a number in [0, 1].");
  return n;
}

function parseDate(value: string) {
  if (Number.isNaN(Date.parse(value))) throw new InvalidArgumentError("Not a date.");
  return new Date(value).toISOString();
}

const program = new Command();
program.name("digest").description("Operator CLI for the channel digest pipeline").version("0.1.0");

program
  .command("config")
  .description("Set or show API configuration")
  .option("--url <url>", "API base URL, e.g. http://localhost:3000")
  .option("--key <key>", "Operator API token")
  .option("--show", "Print current config")
  .action(async (opts: { url?: string; key?: string; show?: boolean }) => {
    const current = await readConfig();
    if (opts.show) {
      if (!current) {
        console.log(dim("No config found."));
        return;
      }
      print({ apiUrl: current.apiUrl, apiKey: "********" });
      return;
    }

    const apiUrl = opts.url ?? current?.apiUrl;
    const apiKey = opts.key ?? current?.apiKey;
    if (!apiUrl || !apiKey) throw new Error("Provide --url and --key (or use --show).");

    await writeConfig({ apiUrl, apiKey });
    console.log(green("Config saved."));
  });

program
  .command("ingest")
  .description("Ingest one channel message")
  .argument("<peerId>", "Channel peer id", parseInteger)
  .argument("<messageId>", "Message id within the channel", parseInteger)
  .argument("<text...>", "Message text")
  .option("--username <username>", "Channel username")
  .option("--date <date>", "Source timestamp (defaults to now)", parseDate)
  .option("--forward", "Mark the message as forwarded")
  .action(
    async (
      peerId: number,
      messageId: number,
      parts: string[],
      opts: { username?: string; date?: string; forward?: boolean }
    ) => {
      const res = await call({
        path: "/api/messages",
        method: "POST",
        body: {
          channel: { peerId, username: opts.username },
          messageId,
          date: opts.date ?? new Date().toISOString(),
          text: parts.join(" "),
          isForward: opts.forward ?? false,
        },
      });
      print(res);
    }
  );

program
  .command("errors")
  .description("List items that failed enrichment")
  .option("--limit <n>", "Max items", parseInteger, 20)
  .action(async (opts: { limit: number }) => {
    print(await call({ path: `/api/items/errors?limit=${opts.limit}` }));
  });

program
  .command("retry")
  .description("Retry one failed item, or all of them with --all")
  .argument("[itemId]", "Item UUID")
  .option("--all", "Retry every failed item")
  .action(async (itemId: string | undefined, opts: { all?: boolean }) => {
    if (opts.all) {
      print(await call({ path: "/api/items/retry-failed", method: "POST" }));
      return;
    }
    if (!itemId) throw new Error("Provide an item id or --all.");
    print(await call({ path: `/api/items/${itemId}/retry`, method: "POST" }));
  });

program
  .command("run")
  .description("Enqueue clustering and digest assembly for a window")
  .requiredOption("--start <date>", "Window start (inclusive)", parseDate)
  .requiredOption("--end <date>", "Window end (exclusive)", parseDate)
  .requiredOption("--chat <chatId>", "Target chat id")
  .action(async (opts: { start: string; end: string; chat: string }) => {
    const res = await call({
      path: "/api/digests/run",
      method: "POST",
      body: { windowStart: opts.start, windowEnd: opts.end, chatId: opts.chat },
    });
    print(res);
  });

program
  .command("clear-errors")
  .description("Delete failed digest rows so their windows can be retried")
  .action(async () => {
    print(await call({ path: "/api/digests/clear-errors", method: "POST" }));
  });

program
  .command("channel")
  .description("Update a channel's importance settings")
  .argument("<peerId>", "Channel peer id", parseInteger)
  .option("--weight <w>", "Importance weight", Number)
  .option("--threshold <t>", "Digest importance threshold", parseRatio)
  .action(async (peerId: number, opts: { weight?: number; threshold?: number }) => {
    const res = await call({
      path: `/api/channels/${peerId}`,
      method: "PATCH",
      body: { importanceWeight: opts.weight, importanceThreshold: opts.threshold },
    });
    print(res);
  });

program
  .command("health")
  .description("Check API health")
  .action(async () => {
    const cfg = await requireConfig();
    const res = await fetch(new URL("/api/health", cfg.apiUrl));
    const body: unknown = await res.json();
    print(body);
    if (!res.ok) process.exitCode = 1;
  });

program.configureOutput({
  outputError: (str, write) => write(red(str)),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
