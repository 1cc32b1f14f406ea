import { captureException } from "@sentry/node";
import type { PlaybackSnapshot } from "../types";
import type { PlaybackRemote } from "../services/StreamingService";
import { ApiError, AuthError, ReconciliationTimeout, describeError } from "../utils/errors";
import {
  planCommand,
  planTransfer,
  replacedKinds,
  type CommandPlan,
  type Intent,
  type PendingCommand,
} from "./commands";
import { displayedSnapshot, type ViewModelWriter } from "./ViewModelBus";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "./options";

type DispatcherOptions = Pick<
  EngineOptions,
  "reconcileDeadlineMs" | "debounceMs" | "positionToleranceMs"
>;

interface DebounceSlot {
  timer: ReturnType<typeof setTimeout>;
  plan: CommandPlan;
  command: PendingCommand;
  settle: () => void;
  settled: Promise<void>;
}

interface Outstanding {
  command: PendingCommand;
  /** Set once the call went out; unsent commands have no deadline yet */
  deadline: ReturnType<typeof setTimeout> | null;
}

/**
 * Turns user intents into optimistic projections and remote calls, then
 * holds each command until a snapshot confirms it or its deadline passes.
 * Only the newest command is projected, but every unconfirmed one keeps its
 * own deadline until a newer command of a competing kind replaces it.
 */
export class CommandDispatcher {
  private nextId = 1;
  private halted = false;
  private readonly outstanding = new Map<number, Outstanding>();
  private readonly debounced = new Map<"seek" | "volume", DebounceSlot>();
  private readonly options: DispatcherOptions;

  constructor(
    private readonly remote: PlaybackRemote,
    private readonly bus: ViewModelWriter,
    options: Partial<DispatcherOptions> = {},
    /** Asks the tracker for an immediate poll after an ambiguous outcome */
    private readonly requestPoll: () => Promise<unknown> = async () => undefined,
  ) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
  }

  /**
   * Handles one intent. Resolves once its remote call (or the trailing call
   * it was coalesced into) has settled; never rejects.
   */
  submit(intent: Intent): Promise<void> {
    if (this.halted) {
      this.bus.notify({ type: "reauthenticate" });
      return Promise.resolve();
    }

    const state = this.bus.getState();
    if (state.transfer) {
      this.bus.notify({ type: "controlsBlocked", reason: "transfer" });
      return Promise.resolve();
    }

    if (intent.kind === "transferDevice") {
      return this.transfer(intent.deviceId);
    }

    const current = displayedSnapshot(state);
    if (!current) {
      this.bus.notify({ type: "noActiveDevice" });
      return Promise.resolve();
    }

    const now = Date.now();
    const plan = planCommand(intent, current, {
      now,
      positionToleranceMs: this.options.positionToleranceMs,
    });
    const command = this.createCommand(plan, now);

    if (plan.projection) {
      // Shown before the call resolves
      this.bus.dispatch({ type: "optimistic", projection: plan.projection, command });
    }

    if (plan.debounceKey) {
      return this.debounce(plan.debounceKey, plan, command);
    }
    return this.send(plan, command);
  }

  /**
   * Checks a polled snapshot against every outstanding command and drops
   * the ones it confirms.
   */
  reconcile(snapshot: PlaybackSnapshot | null): void {
    if (!snapshot) return;
    for (const [id, entry] of this.outstanding) {
      if (entry.command.expectedEffect(snapshot)) {
        this.forget(id);
      }
    }
  }

  /**
   * Stops accepting intents and cancels every timer. Projections and a
   * pending transfer are withdrawn, since nothing can confirm them now.
   */
  halt(): void {
    this.halted = true;
    this.cancelTimers();
    for (const { command } of this.outstanding.values()) {
      this.withdraw(command);
    }
    this.outstanding.clear();
  }

  resume(): void {
    this.halted = false;
  }

  dispose(): void {
    this.halt();
  }

  private createCommand(plan: CommandPlan, now: number): PendingCommand {
    const command: PendingCommand = {
      id: this.nextId++,
      kind: plan.kind,
      description: plan.description,
      issuedAt: now,
      expectedEffect: plan.expectedEffect,
    };
    const replaces = replacedKinds(plan);
    for (const [id, entry] of this.outstanding) {
      if (replaces.includes(entry.command.kind)) {
        this.forget(id);
      }
    }
    this.outstanding.set(command.id, { command, deadline: null });
    return command;
  }

  private debounce(
    key: "seek" | "volume",
    plan: CommandPlan,
    command: PendingCommand,
  ): Promise<void> {
    const existing = this.debounced.get(key);
    if (existing) {
      clearTimeout(existing.timer);
    }

    let settle: () => void = () => undefined;
    const settled =
      existing?.settled ??
      new Promise<void>((resolve) => {
        settle = resolve;
      });

    const slot: DebounceSlot = {
      plan,
      command,
      settle: existing?.settle ?? settle,
      settled,
      timer: setTimeout(() => {
        this.debounced.delete(key);
        void this.send(slot.plan, slot.command).finally(slot.settle);
      }, this.options.debounceMs),
    };
    this.debounced.set(key, slot);
    return settled;
  }

  private async send(plan: CommandPlan, command: PendingCommand): Promise<void> {
    try {
      await plan.send(this.remote);
    } catch (error) {
      this.onSendFailure(plan, command, error);
      return;
    }
    this.armDeadline(command);
  }

  private async transfer(deviceId: string): Promise<void> {
    const state = this.bus.getState();
    const now = Date.now();
    const plan = planTransfer(deviceId, displayedSnapshot(state));
    const command = this.createCommand(plan, now);

    // Controls stay blocked until a snapshot shows the target device
    this.bus.dispatch({
      type: "transferStarted",
      transfer: { commandId: command.id, deviceId, startedAt: now },
    });

    try {
      await plan.send(this.remote);
    } catch (error) {
      this.forget(command.id);
      this.bus.dispatch({ type: "transferSettled", commandId: command.id });
      this.reportFailure(plan, error);
      return;
    }
    this.armDeadline(command);
  }

  private onSendFailure(
    plan: CommandPlan,
    command: PendingCommand,
    error: unknown,
  ): void {
    if (error instanceof ApiError && error.kind === "Ambiguous") {
      // The call may have landed; let the next snapshot decide before reverting
      console.warn(`Outcome of ${plan.description} unknown, re-polling`);
      this.armDeadline(command);
      this.requestPoll().catch((pollError: unknown) => {
        console.warn("Re-poll failed:", describeError(pollError));
      });
      return;
    }

    this.forget(command.id);
    this.bus.dispatch({ type: "revert", commandId: command.id });
    this.reportFailure(plan, error);
  }

  private reportFailure(plan: CommandPlan, error: unknown): void {
    if (error instanceof AuthError) {
      // Revocation is surfaced by the engine
      return;
    }
    if (error instanceof ApiError && error.kind === "NoActiveDevice") {
      this.bus.notify({ type: "noActiveDevice" });
      return;
    }
    if (!(error instanceof ApiError)) {
      captureException(error);
    }
    console.error(`Failed to ${plan.description}:`, describeError(error));
    this.bus.notify({
      type: "commandFailed",
      command: plan.kind,
      description: plan.description,
      error: error instanceof ApiError ? error.kind : "Unknown",
      message: describeError(error),
    });
  }

  private armDeadline(command: PendingCommand): void {
    const entry = this.outstanding.get(command.id);
    // Already confirmed, replaced or withdrawn
    if (this.halted || !entry) {
      return;
    }
    entry.deadline = setTimeout(() => {
      this.outstanding.delete(command.id);
      this.expire(command);
    }, this.options.reconcileDeadlineMs);
  }

  private expire(command: PendingCommand): void {
    // A no-op on the bus when a newer command is the one on display
    this.withdraw(command);

    const timeout = new ReconciliationTimeout(
      command.kind,
      this.options.reconcileDeadlineMs,
    );
    console.warn(`${command.description} may not have applied:`, timeout.message);
    this.bus.notify({
      type: "commandNotApplied",
      command: command.kind,
      description: command.description,
    });
  }

  private withdraw(command: PendingCommand): void {
    this.bus.dispatch(
      command.kind === "transferDevice"
        ? { type: "transferSettled", commandId: command.id }
        : { type: "revert", commandId: command.id },
    );
  }

  private forget(id: number): void {
    const entry = this.outstanding.get(id);
    if (entry?.deadline) {
      clearTimeout(entry.deadline);
    }
    this.outstanding.delete(id);
  }

  private cancelTimers(): void {
    for (const entry of this.outstanding.values()) {
      if (entry.deadline) clearTimeout(entry.deadline);
      entry.deadline = null;
    }
    for (const slot of this.debounced.values()) {
      clearTimeout(slot.timer);
      slot.settle();
    }
    this.debounced.clear();
  }
}
