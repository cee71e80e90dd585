#!/usr/bin/env tsx
/**
 * CLI: interactive REPL for the grocery assistant.
 *
 * A plain line is a dish name and starts a task with the current pantry and
 * email. Slash commands adjust those or ask about the last order.
 */
import { resolve } from "node:path";
import { createInterface, type Interface } from "node:readline";
import { fileURLToPath } from "node:url";
import { Agent, type IterationReport } from "./agent.ts";
import { isEmailAddress, splitItems } from "./cognitive/perceive.ts";
import { getSettings } from "./infra/config.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";
import { normalizeItems } from "./task/state.ts";

const logger = getLogger("cli");

/** Consecutive failed iterations after which the REPL gives up on a task. */
export const MAX_CONSECUTIVE_FAILURES = 3;

export type Command =
  | { kind: "exit" }
  | { kind: "help" }
  | { kind: "status" }
  | { kind: "pantry"; items: string[] }
  | { kind: "email"; recipient: string | null }
  | { kind: "unknown"; name: string }
  | { kind: "error"; message: string }
  | { kind: "task"; subject: string };

export interface CliSession {
  pantry: string[];
  recipient: string | null;
  lastOrderId: string | null;
}

/** Parse one REPL line. Empty lines yield null. */
export function parseCommand(line: string): Command | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  if (!trimmed.startsWith("/")) return { kind: "task", subject: trimmed };

  const space = trimmed.indexOf(" ");
  const name = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
  const rest = space === -1 ? "" : trimmed.slice(space + 1).trim();

  switch (name) {
    case "/exit":
    case "/quit":
      return { kind: "exit" };
    case "/help":
      return { kind: "help" };
    case "/status":
      return { kind: "status" };
    case "/pantry":
      return { kind: "pantry", items: normalizeItems(splitItems(rest)) };
    case "/email":
      if (rest && !isEmailAddress(rest)) {
        return { kind: "error", message: `Not an email address: ${rest}` };
      }
      return { kind: "email", recipient: rest || null };
    default:
      return { kind: "unknown", name };
  }
}

/** Lines printed for one iteration. */
export function formatReport(report: IterationReport): string {
  const label = report.action ?? "error";
  const mark = report.success ? "✓" : "✗";
  const body = report.text
    .split("\n")
    .map((line) => `    ${line}`)
    .join("\n");
  return `  [${report.iteration}] ${mark} ${label}\n${body}`;
}

function printBanner(session: CliSession): void {
  console.log("");
  console.log("╔══════════════════════════════════════╗");
  console.log("║            🥕 Larder CLI             ║");
  console.log("╚══════════════════════════════════════╝");
  console.log(`  Pantry: ${session.pantry.length > 0 ? session.pantry.join(", ") : "(empty)"}`);
  console.log(`  Email:  ${session.recipient ?? "(not set)"}`);
  console.log("  Type a dish name, /help for commands, /exit to quit");
  console.log("");
}

function printHelp(): void {
  console.log("");
  console.log("  Commands:");
  console.log("    <dish>           Cook a dish: fetch, compare, order, notify");
  console.log("    /pantry a, b     Set the ingredients you already have");
  console.log("    /email x@y.com   Set where order confirmations go");
  console.log("    /status          Check the status of the last order");
  console.log("    /help            Show this help message");
  console.log("    /exit            Exit the REPL");
  console.log("");
}

async function runDish(agent: Agent, session: CliSession, subject: string): Promise<void> {
  const controller = new AbortController();
  let failures = 0;

  const result = await agent.runTask(
    { subject, availableItems: session.pantry, recipient: session.recipient },
    {
      signal: controller.signal,
      onIteration: (report) => {
        console.log(formatReport(report));
        failures = report.success ? 0 : failures + 1;
        if (failures >= MAX_CONSECUTIVE_FAILURES) controller.abort();
      },
    },
  );

  if (result.inputError) {
    console.log(`  Part of the input was ignored: ${result.inputError}`);
  }
  if (result.finalState.orderId) {
    session.lastOrderId = result.finalState.orderId;
  }
  console.log(
    `\n  Task ${result.taskId}: ${result.status} after ${result.iterations} iteration(s)\n`,
  );
}

async function showStatus(agent: Agent, session: CliSession): Promise<void> {
  if (!session.lastOrderId) {
    console.log("  No order has been placed yet.\n");
    return;
  }
  const result = await agent.checkOrderStatus(session.lastOrderId);
  console.log(`  ${result.text.split("\n").join("\n  ")}\n`);
}

/** Handle one line. Returns false when the REPL should end. */
async function handleLine(agent: Agent, session: CliSession, line: string): Promise<boolean> {
  const command = parseCommand(line);
  if (!command) return true;

  switch (command.kind) {
    case "exit":
      console.log("\n👋 Goodbye!\n");
      return false;
    case "help":
      printHelp();
      return true;
    case "pantry":
      session.pantry = command.items;
      console.log(`  Pantry: ${command.items.length > 0 ? command.items.join(", ") : "(empty)"}\n`);
      return true;
    case "email":
      session.recipient = command.recipient;
      console.log(`  Email: ${command.recipient ?? "(not set)"}\n`);
      return true;
    case "status":
      await showStatus(agent, session);
      return true;
    case "unknown":
      console.log(`  Unknown command ${command.name}. Type /help for commands.\n`);
      return true;
    case "error":
      console.log(`  ${command.message}\n`);
      return true;
    case "task":
      await runDish(agent, session, command.subject);
      return true;
  }
}

/** Main CLI REPL loop. */
export async function startCLI(): Promise<void> {
  const settings = getSettings();
  const agent = new Agent({ settings });
  await agent.start();

  const session: CliSession = { pantry: [], recipient: null, lastOrderId: null };
  printBanner(session);

  const rl: Interface = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("> ");

  rl.on("close", () => {
    agent.stop().catch((err: unknown) => {
      logger.error({ error: errorToString(err) }, "agent_stop_failed");
    });
  });

  rl.on("line", (line) => {
    rl.pause();
    handleLine(agent, session, line)
      .then((keepGoing) => {
        if (keepGoing) {
          rl.resume();
          rl.prompt();
        } else {
          rl.close();
        }
      })
      .catch((err: unknown) => {
        logger.error({ error: errorToString(err) }, "cli_error");
        console.log(`  [Error] ${errorToString(err)}\n`);
        rl.resume();
        rl.prompt();
      });
  });

  rl.prompt();
}

// Entry point: run CLI when this file is executed directly
const entry = process.argv[1];
if (entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url)) {
  startCLI().catch((err: unknown) => {
    console.error("Fatal error:", errorToString(err));
    process.exit(1);
  });
}
