/**
 * @snipledger/ledger — Core SnippetLedger class.
 *
 * In-memory bookkeeping for snippets, tips, hint requests, votes,
 * tags and badges. Every mutating operation validates first, then
 * mutates, then appends exactly one event.
 *
 * API surface:
 * - submitSnippet() / updateSnippet() / deleteSnippet() — Snippet lifecycle
 * - tipSnippet() / withdrawTips() / withdrawTreasuryFees() — Tip bookkeeping
 * - requestHint() / fulfillHint() — Hint requests
 * - upvoteSnippet() / downvoteSnippet() — Reputation
 * - registerLanguage() / setPaused() / awardBadge() — Curator controls
 * - addSnippetTag() — Tagging
 * - submitSnippetBatch() / tipSnippetBatch() — Batch helpers
 * - snapshot() — Serialize the entire ledger state
 *
 * Operations are synchronous and run to completion, so each one is atomic
 * with respect to every other call on the same instance.
 */

import {
  BUILTIN_LANGUAGES,
  DEFAULT_LIMITS,
  DEFAULT_ROLES,
  SCHEMA_VERSION,
} from "./constants.js";
import { sha256Hex, systemClock, utf8Length } from "./digest.js";
import { LedgerEventLog } from "./event-log.js";
import type { EventQuery, LedgerEventHandler, Subscription } from "./event-log.js";
import type { LedgerEvent, LedgerEventBody } from "./events.js";
import { RecentQueue } from "./recent-queue.js";
import type {
  Clock,
  DigestFn,
  HintRequest,
  LedgerConfig,
  LedgerLimits,
  LedgerOptions,
  LedgerRoles,
  LedgerSnapshot,
  LedgerStats,
  Snippet,
  SubmitBatchResult,
  TipReceipt,
} from "./types.js";
import { LedgerError } from "./types.js";

const REPUTATION_DELTA = 1;

/** Per-account state. Created on first write, never removed. */
interface AccountState {
  tipBalance: bigint;
  reputation: number;
  badges: number;
  readonly active: Set<number>;
  readonly hints: number[];
  readonly upvoted: Set<number>;
  readonly downvoted: Set<number>;
}

type VoteDirection = "up" | "down";

/**
 * Snippet ledger engine.
 *
 * Instances are fully independent: all state lives in instance fields.
 */
export class SnippetLedger {
  private readonly _config: LedgerConfig;
  private readonly _clock: Clock;
  private readonly _digest: DigestFn;

  private readonly _snippets = new Map<number, Snippet>();
  private readonly _hints = new Map<number, HintRequest>();
  private readonly _accounts = new Map<string, AccountState>();
  private readonly _languages = new Map<string, number>();
  private readonly _tags = new Map<number, readonly string[]>();
  private readonly _contentIndex = new Map<string, Set<number>>();
  private readonly _recent: RecentQueue;
  private readonly _events: LedgerEventLog;

  private _paused = false;
  private _nextSnippetId = 1;
  private _nextHintId = 1;
  private _totalTipsReceived = 0n;
  private _totalTipsWithdrawn = 0n;
  private _totalTreasuryFees = 0n;
  private _totalTreasuryFeesWithdrawn = 0n;

  constructor(options: LedgerOptions = {}) {
    const roles: LedgerRoles = {
      curator: resolveIdentity("curator", options.curator, DEFAULT_ROLES.curator),
      treasury: resolveIdentity("treasury", options.treasury, DEFAULT_ROLES.treasury),
      fulfiller: resolveIdentity("fulfiller", options.fulfiller, DEFAULT_ROLES.fulfiller),
    };
    const limits = resolveLimits(options.limits ?? {});

    this._config = Object.freeze({ ...limits, ...roles, schemaVersion: SCHEMA_VERSION });
    this._clock = options.clock ?? systemClock;
    this._digest = options.digest ?? sha256Hex;
    this._recent = new RecentQueue(limits.recentQueueSize);
    this._events = new LedgerEventLog(options.onSubscriberError);

    for (const name of BUILTIN_LANGUAGES) {
      this._languages.set(this._digest(name), 0);
    }
  }

  // ─── Snippets ────────────────────────────────────────────────────────

  /**
   * Submit a new snippet. Returns its id.
   *
   * Rejects when paused, when the body or title is too long, when the
   * language is not registered, or when the author already has the
   * maximum number of active snippets.
   */
  submitSnippet(
    author: string,
    content: string,
    languageId: string,
    title: string | null = null,
  ): number {
    this._assertNotPaused();
    this._assertContentSize(content);
    if (title !== null && utf8Length(title) > this._config.maxTitleBytes) {
      throw new LedgerError(
        "TITLE_TOO_LONG",
        `Title exceeds ${this._config.maxTitleBytes} bytes`,
      );
    }
    const languageCount = this._languages.get(languageId);
    if (languageCount === undefined) {
      throw new LedgerError(
        "LANGUAGE_NOT_REGISTERED",
        `Language is not registered: "${languageId}"`,
      );
    }
    const activeCount = this._accounts.get(author)?.active.size ?? 0;
    if (activeCount >= this._config.maxSnippetsPerAuthor) {
      throw new LedgerError(
        "AUTHOR_SNIPPET_CAP",
        `Author "${author}" already has ${activeCount} active snippets`,
      );
    }

    const id = this._nextSnippetId++;
    const now = this._clock.now();
    const snippet: Snippet = {
      id,
      author,
      contentHash: this._digest(content),
      languageId,
      createdAt: now,
      updatedAt: now,
      tipBalance: 0n,
      reputation: 0,
      deleted: false,
    };

    this._snippets.set(id, snippet);
    this._indexContent(snippet.contentHash, id);
    this._account(author).active.add(id);
    this._languages.set(languageId, languageCount + 1);
    this._recent.push(id);

    this._emit({
      type: "SnippetSubmitted",
      snippetId: id,
      author,
      contentHash: snippet.contentHash,
      languageId,
      createdAt: now,
    });
    return id;
  }

  /**
   * Replace a snippet's content. Only its author may update it.
   */
  updateSnippet(id: number, author: string, newContent: string): Snippet {
    this._assertNotPaused();
    const snippet = this._requireLiveSnippet(id);
    this._assertAuthor(snippet, author);
    this._assertContentSize(newContent);

    const now = this._clock.now();
    const updated: Snippet = {
      ...snippet,
      contentHash: this._digest(newContent),
      updatedAt: now,
    };

    this._snippets.set(id, updated);
    this._unindexContent(snippet.contentHash, id);
    this._indexContent(updated.contentHash, id);

    this._emit({
      type: "SnippetUpdated",
      snippetId: id,
      author,
      contentHash: updated.contentHash,
      updatedAt: now,
    });
    return updated;
  }

  /**
   * Soft-delete a snippet. Not gated by pause.
   * The snippet stays addressable by id but leaves every active count.
   */
  deleteSnippet(id: number, author: string): void {
    const snippet = this._requireLiveSnippet(id);
    this._assertAuthor(snippet, author);

    this._snippets.set(id, { ...snippet, deleted: true });
    const count = this._languages.get(snippet.languageId) ?? 0;
    this._languages.set(snippet.languageId, Math.max(0, count - 1));
    this._account(author).active.delete(id);
    this._recomputeReputation(author);

    this._emit({
      type: "SnippetDeleted",
      snippetId: id,
      author,
      deletedAt: this._clock.now(),
    });
  }

  /**
   * Tag a snippet. Returns false (and changes nothing) when the snippet
   * already carries the tag or has no free tag slot.
   */
  addSnippetTag(id: number, tag: string, author: string): boolean {
    const snippet = this._requireLiveSnippet(id);
    this._assertAuthor(snippet, author);

    const tags = this._tags.get(id) ?? [];
    if (tags.length >= this._config.maxTagsPerSnippet || tags.includes(tag)) {
      return false;
    }

    this._tags.set(id, [...tags, tag]);
    this._emit({
      type: "SnippetTagAdded",
      snippetId: id,
      tag,
      taggedAt: this._clock.now(),
    });
    return true;
  }

  // ─── Tips ────────────────────────────────────────────────────────────

  /**
   * Tip a snippet's author. The treasury keeps `amount * feeBps / denom`
   * (truncated); the author is credited the rest.
   */
  tipSnippet(id: number, tipper: string, amount: bigint): TipReceipt {
    this._assertNotPaused();
    if (amount < this._config.minTipUnit) {
      throw new LedgerError(
        "TIP_TOO_SMALL",
        `Tip ${amount.toString()} is below the minimum of ${this._config.minTipUnit.toString()}`,
      );
    }
    const snippet = this._requireLiveSnippet(id);

    const fee = (amount * this._config.treasuryFeeBps) / this._config.bpsDenominator;
    const toAuthor = amount - fee;

    this._snippets.set(id, { ...snippet, tipBalance: snippet.tipBalance + toAuthor });
    this._account(snippet.author).tipBalance += toAuthor;
    this._totalTipsReceived += amount;
    this._totalTreasuryFees += fee;

    this._emit({
      type: "SnippetTipped",
      snippetId: id,
      tipper,
      author: snippet.author,
      amount,
      toAuthor,
      fee,
      tippedAt: this._clock.now(),
    });
    return { snippetId: id, amount, fee, toAuthor };
  }

  /**
   * Withdraw the author's whole tip balance. Not gated by pause.
   */
  withdrawTips(author: string): bigint {
    const account = this._accounts.get(author);
    const amount = account?.tipBalance ?? 0n;
    if (account === undefined || amount <= 0n) {
      throw new LedgerError("INSUFFICIENT_BALANCE", `No tips to withdraw for "${author}"`);
    }

    account.tipBalance = 0n;
    this._totalTipsWithdrawn += amount;

    this._emit({
      type: "TipsWithdrawn",
      author,
      amount,
      withdrawnAt: this._clock.now(),
    });
    return amount;
  }

  /**
   * Withdraw every treasury fee collected so far. Treasury only.
   */
  withdrawTreasuryFees(treasury: string): bigint {
    this._assertRole("treasury", treasury);
    const amount = this._totalTreasuryFees - this._totalTreasuryFeesWithdrawn;
    if (amount <= 0n) {
      throw new LedgerError("INSUFFICIENT_BALANCE", "No treasury fees to withdraw");
    }

    this._totalTreasuryFeesWithdrawn += amount;
    this._emit({
      type: "TreasuryFeesWithdrawn",
      treasury,
      amount,
      withdrawnAt: this._clock.now(),
    });
    return amount;
  }

  // ─── Hints ───────────────────────────────────────────────────────────

  /**
   * Open a hint request, optionally linked to a snippet (0 = none).
   * The open-request cap is per requester, whatever the link.
   */
  requestHint(requester: string, topic: string, snippetId = 0): number {
    this._assertNotPaused();
    const open = this.getOpenHintCount(requester);
    if (open >= this._config.maxOpenHintsPerUser) {
      throw new LedgerError(
        "HINT_REQUEST_CAP",
        `"${requester}" already has ${open} open hint requests`,
      );
    }
    if (snippetId !== 0) {
      this._requireLiveSnippet(snippetId);
    }

    const id = this._nextHintId++;
    const now = this._clock.now();
    this._hints.set(id, {
      id,
      requester,
      topic,
      snippetId,
      createdAt: now,
      fulfilled: false,
      fulfilledAt: 0,
    });
    this._account(requester).hints.push(id);

    this._emit({
      type: "HintRequested",
      hintId: id,
      requester,
      topic,
      snippetId,
      createdAt: now,
    });
    return id;
  }

  /**
   * Mark a hint request fulfilled. Fulfiller only; terminal.
   */
  fulfillHint(id: number, fulfiller: string): HintRequest {
    this._assertRole("fulfiller", fulfiller);
    this._assertNotPaused();
    const hint = this._hints.get(id);
    if (hint === undefined) {
      throw new LedgerError("INVALID_HINT_ID", `Unknown hint id: ${id}`);
    }
    if (hint.fulfilled) {
      throw new LedgerError("HINT_ALREADY_FULFILLED", `Hint ${id} is already fulfilled`);
    }

    const now = this._clock.now();
    const fulfilledHint: HintRequest = {
      ...hint,
      fulfilled: true,
      fulfiller,
      fulfilledAt: now,
    };
    this._hints.set(id, fulfilledHint);

    this._emit({ type: "HintFulfilled", hintId: id, fulfiller, fulfilledAt: now });
    return fulfilledHint;
  }

  // ─── Votes ───────────────────────────────────────────────────────────

  /** Upvote a snippet. Returns the snippet's new score. */
  upvoteSnippet(id: number, voter: string): number {
    return this._vote(id, voter, "up");
  }

  /** Downvote a snippet. Returns the snippet's new score. */
  downvoteSnippet(id: number, voter: string): number {
    return this._vote(id, voter, "down");
  }

  private _vote(id: number, voter: string, direction: VoteDirection): number {
    this._assertNotPaused();
    const snippet = this._requireLiveSnippet(id);
    if (snippet.author === voter) {
      throw new LedgerError("CANNOT_VOTE_OWN", "Authors cannot vote on their own snippets");
    }
    const existing = this._accounts.get(voter);
    if (direction === "up" && existing?.upvoted.has(id) === true) {
      throw new LedgerError("ALREADY_UPVOTED", `"${voter}" already upvoted snippet ${id}`);
    }
    if (direction === "down" && existing?.downvoted.has(id) === true) {
      throw new LedgerError("ALREADY_DOWNVOTED", `"${voter}" already downvoted snippet ${id}`);
    }

    const account = this._account(voter);
    const same = direction === "up" ? account.upvoted : account.downvoted;
    const opposite = direction === "up" ? account.downvoted : account.upvoted;
    const step = (score: number): number =>
      direction === "up" ? score + REPUTATION_DELTA : Math.max(0, score - REPUTATION_DELTA);

    let score = snippet.reputation;
    if (opposite.delete(id)) {
      // Undo the opposite vote first.
      score = step(score);
    }
    score = step(score);
    same.add(id);

    this._snippets.set(id, { ...snippet, reputation: score });
    this._recomputeReputation(snippet.author);

    const votedAt = this._clock.now();
    if (direction === "up") {
      this._emit({ type: "ReputationUpvote", snippetId: id, voter, newScore: score, votedAt });
    } else {
      this._emit({ type: "ReputationDownvote", snippetId: id, voter, newScore: score, votedAt });
    }
    return score;
  }

  // ─── Curator Controls ────────────────────────────────────────────────

  /**
   * Add a language digest to the registry. Curator only; not gated by pause.
   */
  registerLanguage(languageId: string, curator: string): void {
    this._assertRole("curator", curator);
    if (this._languages.has(languageId)) {
      throw new LedgerError(
        "LANGUAGE_ALREADY_REGISTERED",
        `Language is already registered: "${languageId}"`,
      );
    }

    this._languages.set(languageId, 0);
    this._emit({
      type: "LanguageRegistered",
      languageId,
      registeredBy: curator,
      registeredAt: this._clock.now(),
    });
  }

  setPaused(paused: boolean, curator: string): void {
    this._assertRole("curator", curator);
    this._paused = paused;
    this._emit({
      type: "PauseToggled",
      paused,
      toggledBy: curator,
      toggledAt: this._clock.now(),
    });
  }

  /**
   * Set badge bit `slot` for an account. Slots outside the badge range
   * are ignored.
   */
  awardBadge(account: string, slot: number, curator: string): void {
    this._assertRole("curator", curator);
    if (!Number.isInteger(slot) || slot < 0 || slot >= this._config.badgeSlots) {
      return;
    }

    const state = this._account(account);
    state.badges |= 1 << slot;
    this._emit({
      type: "BadgeAwarded",
      account,
      slot,
      badges: state.badges,
      awardedAt: this._clock.now(),
    });
  }

  // ─── Batches ─────────────────────────────────────────────────────────

  /**
   * Submit several snippets in order. Stops at the first failure; snippets
   * submitted before it stay submitted and their ids are returned along
   * with the failure.
   */
  submitSnippetBatch(
    author: string,
    contents: readonly string[],
    languageId: string,
    titles: readonly (string | null)[],
  ): SubmitBatchResult {
    const items = zipBatch(contents, titles, this._config.maxSubmitBatch);
    const ids: number[] = [];

    for (const [index, [content, title]] of items.entries()) {
      try {
        ids.push(this.submitSnippet(author, content, languageId, title));
      } catch (err) {
        if (err instanceof LedgerError) {
          return { ids, failure: { index, error: err } };
        }
        throw err;
      }
    }

    return { ids };
  }

  /**
   * Tip several snippets in order. The first failing tip throws; tips
   * applied before it are kept.
   */
  tipSnippetBatch(
    tipper: string,
    snippetIds: readonly number[],
    amounts: readonly bigint[],
  ): readonly TipReceipt[] {
    const items = zipBatch(snippetIds, amounts, this._config.maxTipBatch);
    return items.map(([id, amount]) => this.tipSnippet(id, tipper, amount));
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getSnippet(id: number): Snippet | undefined {
    return this._snippets.get(id);
  }

  getHint(id: number): HintRequest | undefined {
    return this._hints.get(id);
  }

  getTipBalance(author: string): bigint {
    return this._accounts.get(author)?.tipBalance ?? 0n;
  }

  getAuthorReputation(author: string): number {
    return this._accounts.get(author)?.reputation ?? 0;
  }

  getBadges(account: string): number {
    return this._accounts.get(account)?.badges ?? 0;
  }

  hasBadge(account: string, slot: number): boolean {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this._config.badgeSlots) {
      return false;
    }
    return (this.getBadges(account) & (1 << slot)) !== 0;
  }

  getSnippetTags(id: number): readonly string[] {
    return this._tags.get(id) ?? [];
  }

  /** Active snippet ids of an author, ascending. */
  getSnippetsByAuthor(author: string): readonly number[] {
    const active = this._accounts.get(author)?.active;
    return active === undefined ? [] : [...active].sort((a, b) => a - b);
  }

  getLanguageCount(languageId: string): number {
    return this._languages.get(languageId) ?? 0;
  }

  isLanguageRegistered(languageId: string): boolean {
    return this._languages.has(languageId);
  }

  /** Digest of a language name, as used for `languageId`. */
  languageIdOf(name: string): string {
    return this._digest(name);
  }

  /** Most recently submitted snippet ids, newest first. */
  getRecentSnippetIds(): readonly number[] {
    return this._recent.toArray();
  }

  /** Unfulfilled hint ids of a requester, in request order. */
  getOpenHints(requester: string): readonly number[] {
    const ids = this._accounts.get(requester)?.hints ?? [];
    return ids.filter((id) => this._hints.get(id)?.fulfilled === false);
  }

  getOpenHintCount(requester: string): number {
    return this.getOpenHints(requester).length;
  }

  /**
   * The lowest-id live snippet holding this content, or the lowest-id
   * deleted one when no live holder remains.
   */
  findSnippetByContentHash(contentHash: string): Snippet | undefined {
    let fallback: Snippet | undefined;
    const ids = [...(this._contentIndex.get(contentHash) ?? [])].sort((a, b) => a - b);
    for (const id of ids) {
      const snippet = this._snippets.get(id);
      if (snippet === undefined) {
        continue;
      }
      if (!snippet.deleted) {
        return snippet;
      }
      fallback ??= snippet;
    }
    return fallback;
  }

  hasUpvoted(voter: string, id: number): boolean {
    return this._accounts.get(voter)?.upvoted.has(id) ?? false;
  }

  hasDownvoted(voter: string, id: number): boolean {
    return this._accounts.get(voter)?.downvoted.has(id) ?? false;
  }

  isPaused(): boolean {
    return this._paused;
  }

  getConfig(): LedgerConfig {
    return this._config;
  }

  getStats(): LedgerStats {
    let activeSnippetCount = 0;
    for (const snippet of this._snippets.values()) {
      if (!snippet.deleted) activeSnippetCount++;
    }
    let openHintCount = 0;
    for (const hint of this._hints.values()) {
      if (!hint.fulfilled) openHintCount++;
    }

    return {
      totalTipsReceived: this._totalTipsReceived,
      totalTipsWithdrawn: this._totalTipsWithdrawn,
      totalTreasuryFees: this._totalTreasuryFees,
      totalTreasuryFeesWithdrawn: this._totalTreasuryFeesWithdrawn,
      pendingTreasuryFees: this._totalTreasuryFees - this._totalTreasuryFeesWithdrawn,
      snippetCount: this._snippets.size,
      activeSnippetCount,
      hintCount: this._hints.size,
      openHintCount,
      languageCount: this._languages.size,
      eventCount: this._events.size,
      paused: this._paused,
    };
  }

  // ─── Events ──────────────────────────────────────────────────────────

  getEvents(query?: EventQuery): readonly LedgerEvent[] {
    return this._events.read(query);
  }

  /** Called synchronously after every appended event. */
  subscribe(handler: LedgerEventHandler): Subscription {
    return this._events.subscribe(handler);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Serializable view of the whole ledger state.
   * Entries are ordered by id / account so equal states give equal snapshots.
   */
  snapshot(): LedgerSnapshot {
    const snippets = [...this._snippets.values()]
      .sort((a, b) => a.id - b.id)
      .map((s) => ({
        id: s.id,
        author: s.author,
        contentHash: s.contentHash,
        languageId: s.languageId,
        createdAt: s.createdAt,
        updatedAt: s.updatedAt,
        tipBalance: s.tipBalance.toString(),
        reputation: s.reputation,
        deleted: s.deleted,
        tags: this.getSnippetTags(s.id),
      }));

    const authors = [...this._accounts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([account, state]) => ({
        account,
        tipBalance: state.tipBalance.toString(),
        reputation: state.reputation,
        badges: state.badges,
        upvoted: [...state.upvoted].sort((a, b) => a - b),
        downvoted: [...state.downvoted].sort((a, b) => a - b),
      }));

    const languages = [...this._languages.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([languageId, count]) => ({ languageId, count }));

    return {
      version: 1,
      paused: this._paused,
      roles: {
        curator: this._config.curator,
        treasury: this._config.treasury,
        fulfiller: this._config.fulfiller,
      },
      snippets,
      hints: [...this._hints.values()]
        .sort((a, b) => a.id - b.id)
        .map((h) => ({ ...h, fulfiller: h.fulfiller ?? null })),
      authors,
      languages,
      recent: this._recent.toArray(),
      totals: {
        tipsReceived: this._totalTipsReceived.toString(),
        tipsWithdrawn: this._totalTipsWithdrawn.toString(),
        treasuryFees: this._totalTreasuryFees.toString(),
        treasuryFeesWithdrawn: this._totalTreasuryFeesWithdrawn.toString(),
      },
      eventCount: this._events.size,
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _account(account: string): AccountState {
    let state = this._accounts.get(account);
    if (state === undefined) {
      state = {
        tipBalance: 0n,
        reputation: 0,
        badges: 0,
        active: new Set(),
        hints: [],
        upvoted: new Set(),
        downvoted: new Set(),
      };
      this._accounts.set(account, state);
    }
    return state;
  }

  private _recomputeReputation(author: string): void {
    const state = this._account(author);
    let total = 0;
    for (const id of state.active) {
      total += this._snippets.get(id)?.reputation ?? 0;
    }
    state.reputation = total;
  }

  private _emit(body: LedgerEventBody): void {
    this._events.append(body);
  }

  private _indexContent(contentHash: string, id: number): void {
    const holders = this._contentIndex.get(contentHash);
    if (holders === undefined) {
      this._contentIndex.set(contentHash, new Set([id]));
    } else {
      holders.add(id);
    }
  }

  private _unindexContent(contentHash: string, id: number): void {
    const holders = this._contentIndex.get(contentHash);
    holders?.delete(id);
    if (holders?.size === 0) {
      this._contentIndex.delete(contentHash);
    }
  }

  private _requireLiveSnippet(id: number): Snippet {
    const snippet = this._snippets.get(id);
    if (snippet === undefined) {
      throw new LedgerError("INVALID_SNIPPET_ID", `Unknown snippet id: ${id}`);
    }
    if (snippet.deleted) {
      throw new LedgerError("SNIPPET_DELETED", `Snippet ${id} is deleted`);
    }
    return snippet;
  }

  private _assertAuthor(snippet: Snippet, caller: string): void {
    if (snippet.author !== caller) {
      throw new LedgerError("NOT_AUTHOR", `"${caller}" is not the author of snippet ${snippet.id}`);
    }
  }

  private _assertContentSize(content: string): void {
    if (utf8Length(content) > this._config.maxSnippetBytes) {
      throw new LedgerError(
        "SNIPPET_TOO_LONG",
        `Snippet exceeds ${this._config.maxSnippetBytes} bytes`,
      );
    }
  }

  private _assertNotPaused(): void {
    if (this._paused) {
      throw new LedgerError("PAUSED", "Ledger is paused");
    }
  }

  private _assertRole(role: keyof LedgerRoles, caller: string): void {
    if (caller.toLowerCase() !== this._config[role].toLowerCase()) {
      switch (role) {
        case "curator":
          throw new LedgerError("CURATOR_ONLY", "Only the curator may do this");
        case "treasury":
          throw new LedgerError("TREASURY_ONLY", "Only the treasury may do this");
        case "fulfiller":
          throw new LedgerError("FULFILLER_ONLY", "Only the fulfiller may do this");
      }
    }
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────

function resolveIdentity(role: string, value: string | undefined, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  if (value.trim() === "") {
    throw new LedgerError("ZERO_ADDRESS", `The ${role} identity must not be empty`);
  }
  return value;
}

/** Defaults for every limit the caller leaves undefined. */
function resolveLimits(overrides: Partial<LedgerLimits>): LedgerLimits {
  const d = DEFAULT_LIMITS;
  return {
    maxSnippetBytes: overrides.maxSnippetBytes ?? d.maxSnippetBytes,
    maxTitleBytes: overrides.maxTitleBytes ?? d.maxTitleBytes,
    minTipUnit: overrides.minTipUnit ?? d.minTipUnit,
    maxSnippetsPerAuthor: overrides.maxSnippetsPerAuthor ?? d.maxSnippetsPerAuthor,
    maxOpenHintsPerUser: overrides.maxOpenHintsPerUser ?? d.maxOpenHintsPerUser,
    treasuryFeeBps: overrides.treasuryFeeBps ?? d.treasuryFeeBps,
    bpsDenominator: overrides.bpsDenominator ?? d.bpsDenominator,
    badgeSlots: overrides.badgeSlots ?? d.badgeSlots,
    recentQueueSize: overrides.recentQueueSize ?? d.recentQueueSize,
    maxTagsPerSnippet: overrides.maxTagsPerSnippet ?? d.maxTagsPerSnippet,
    maxSubmitBatch: overrides.maxSubmitBatch ?? d.maxSubmitBatch,
    maxTipBatch: overrides.maxTipBatch ?? d.maxTipBatch,
  };
}

function zipBatch<A, B>(
  left: readonly A[],
  right: readonly B[],
  max: number,
): [A, B][] {
  if (left.length !== right.length) {
    throw new LedgerError(
      "INVALID_BATCH",
      `Batch lists differ in length: ${left.length} vs ${right.length}`,
    );
  }
  if (left.length > max) {
    throw new LedgerError("INVALID_BATCH", `Batch of ${left.length} exceeds the limit of ${max}`);
  }
  return left.map((item, i): [A, B] => [item, right[i]!]);
}
