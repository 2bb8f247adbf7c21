#!/usr/bin/env node
/**
 * @snipledger/demo — Interactive CLI walkthrough.
 *
 * Drives one ledger through its lifecycle in your terminal:
 * submit -> tip -> vote -> tag -> hint -> pause -> withdraw ->
 * treasury -> batch -> events -> state-hash
 *
 * Uses the engine package directly (no HTTP server).
 */

import chalk from "chalk";
import {
  SnippetLedger,
  computeLedgerStateHash,
  isLedgerError,
  sha256Hex,
  type LedgerEvent,
} from "@snipledger/ledger";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = Number(process.env["DEMO_DELAY_MS"] ?? 400);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                   SNIPPET LEDGER DEMO                    ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("           Snippets, tips, hints and reputation           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function rejected(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

/** Run `fn`, expecting a ledger rejection; print its code. */
function expectRejection(label: string, fn: () => unknown): void {
  try {
    fn();
  } catch (err) {
    if (isLedgerError(err)) {
      rejected(`${label}: ${err.code}`);
      return;
    }
    throw err;
  }
  throw new Error(`Expected "${label}" to be rejected`);
}

function describeEvent(event: LedgerEvent): string {
  switch (event.type) {
    case "SnippetSubmitted":
      return `snippet #${event.snippetId} by ${event.author}`;
    case "SnippetTipped":
      return `#${event.snippetId} +${event.toAuthor.toString()} (fee ${event.fee.toString()})`;
    case "TipsWithdrawn":
    case "TreasuryFeesWithdrawn":
      return event.amount.toString();
    case "ReputationUpvote":
    case "ReputationDownvote":
      return `#${event.snippetId} score ${event.newScore}`;
    case "HintRequested":
      return `hint #${event.hintId} from ${event.requester}`;
    case "HintFulfilled":
      return `hint #${event.hintId}`;
    case "PauseToggled":
      return event.paused ? "paused" : "resumed";
    default:
      return "";
  }
}

const CURATOR = "curator.demo";
const TREASURY = "treasury.demo";
const FULFILLER = "fulfiller.demo";
const TOTAL_STEPS = 11;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one in-memory snippet ledger."));
  console.log(chalk.gray("  Every step calls the real engine.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const ledger = new SnippetLedger({ curator: CURATOR, treasury: TREASURY, fulfiller: FULFILLER });
  const config = ledger.getConfig();
  ok("Ledger initialized");
  info("curator", config.curator);
  info("treasury fee", `${config.treasuryFeeBps.toString()} bps`);
  info("min tip", config.minTipUnit.toString());
  const ts = ledger.languageIdOf("typescript");
  hashLine("typescript", ts);

  await sleep(DELAY_MS);

  // ─── Step 2: Submit ─────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Submit Snippets");

  const first = ledger.submitSnippet("ada", "export const sum = (a: number, b: number) => a + b;", ts, "sum");
  const second = ledger.submitSnippet("ada", "fn main() { println!(\"hi\"); }", ledger.languageIdOf("rust"));
  ok(`ada submitted #${first} and #${second}`);
  const firstSnippet = ledger.getSnippet(first);
  if (firstSnippet !== undefined) {
    hashLine("content hash", firstSnippet.contentHash);
  }
  expectRejection("cobol snippet", () => ledger.submitSnippet("ada", "DISPLAY 'HI'.", ledger.languageIdOf("cobol")));

  await sleep(DELAY_MS);

  // ─── Step 3: Tip ────────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Tip");

  const receipt = ledger.tipSnippet(first, "grace", 10_000n);
  ok(`grace tipped #${first}`);
  info("amount", receipt.amount.toString());
  info("to author", receipt.toAuthor.toString());
  info("treasury fee", receipt.fee.toString());
  expectRejection("tip of 5", () => ledger.tipSnippet(first, "grace", 5n));

  await sleep(DELAY_MS);

  // ─── Step 4: Vote ───────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Vote");

  ledger.upvoteSnippet(first, "grace");
  ledger.upvoteSnippet(first, "linus");
  const score = ledger.downvoteSnippet(first, "grace");
  ok(`#${first} score after two upvotes and a switched vote: ${score}`);
  info("ada reputation", String(ledger.getAuthorReputation("ada")));
  expectRejection("self vote", () => ledger.upvoteSnippet(first, "ada"));

  await sleep(DELAY_MS);

  // ─── Step 5: Tag ────────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Tag");

  ledger.addSnippetTag(first, sha256Hex("arithmetic"), "ada");
  ok(`#${first} tagged (${ledger.getSnippetTags(first).length} tag)`);

  await sleep(DELAY_MS);

  // ─── Step 6: Hints ──────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Hints");

  const hint = ledger.requestHint("linus", sha256Hex("overflow in sum"), first);
  ok(`linus opened hint #${hint} on #${first}`);
  ledger.fulfillHint(hint, FULFILLER);
  ok(`hint #${hint} fulfilled by ${FULFILLER}`);
  expectRejection("fulfil twice", () => ledger.fulfillHint(hint, FULFILLER));

  await sleep(DELAY_MS);

  // ─── Step 7: Pause ──────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Pause");

  ledger.setPaused(true, CURATOR);
  ok("Curator paused the ledger");
  expectRejection("submit while paused", () => ledger.submitSnippet("ada", "x", ts));
  ledger.setPaused(false, CURATOR);
  ok("Curator resumed the ledger");

  await sleep(DELAY_MS);

  // ─── Step 8: Withdraw ───────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Withdraw");

  const withdrawn = ledger.withdrawTips("ada");
  ok(`ada withdrew ${withdrawn.toString()}`);
  const fees = ledger.withdrawTreasuryFees(TREASURY);
  ok(`treasury withdrew ${fees.toString()}`);
  expectRejection("withdraw again", () => ledger.withdrawTips("ada"));

  await sleep(DELAY_MS);

  // ─── Step 9: Batch ──────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Batch Submit");

  const batch = ledger.submitSnippetBatch(
    "grace",
    ["print(1)", "x".repeat(config.maxSnippetBytes + 1), "print(3)"],
    ledger.languageIdOf("python"),
    [null, null, null],
  );
  ok(`submitted ${batch.ids.length} before the first failure`);
  if (batch.failure !== undefined) {
    rejected(`item ${batch.failure.index}: ${batch.failure.error.code}`);
  }

  await sleep(DELAY_MS);

  // ─── Step 10: Events ────────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Event Log");

  const events = ledger.getEvents();
  info("events", `${events.length} total`);
  console.log();
  for (const event of events) {
    console.log(chalk.gray("    ") + chalk.dim(`${String(event.sequence).padStart(3)} ${event.type.padEnd(22)} ${describeEvent(event)}`));
  }

  await sleep(DELAY_MS);

  // ─── Step 11: State Hash ────────────────────────────────────────────

  stepHeader(11, TOTAL_STEPS, "State Hash");

  const stateHash = computeLedgerStateHash(ledger.snapshot());
  hashLine("state hash", stateHash.hash);
  info("computed at", stateHash.computedAt);

  const stats = ledger.getStats();
  console.log();
  console.log(chalk.white("    Snippets:            ") + chalk.cyan.bold(`${stats.activeSnippetCount} active of ${stats.snippetCount}`));
  console.log(chalk.white("    Hints:               ") + chalk.cyan.bold(`${stats.openHintCount} open of ${stats.hintCount}`));
  console.log(chalk.white("    Tips received:       ") + chalk.cyan.bold(stats.totalTipsReceived.toString()));
  console.log(chalk.white("    Fees withdrawn:      ") + chalk.cyan.bold(stats.totalTreasuryFeesWithdrawn.toString()));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
