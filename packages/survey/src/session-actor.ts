import type { Logger } from "@logtape/logtape"
import { failure, type ResultCell } from "@questline/providers"
import type { Patch } from "mutative"
import {
  type CommandContext,
  CommandExecutor,
  type CommandHandlers,
  type SessionState,
} from "./command-executor.js"
import { commandHandlers } from "./command-handlers/index.js"
import { CommandQueue } from "./command-queue.js"
import type { SurveyCommand } from "./commands.js"
import { computeCurrentQuestion } from "./derive-question.js"
import { SessionNotInitializedError } from "./errors.js"
import {
  createSessionUpdate,
  init as sessionInit,
  type SessionMessage,
  type SessionUpdate,
} from "./session-program.js"
import type { EphemeralSurveyQuestion, SessionId } from "./types.js"

type SessionActorParams = {
  logger: Logger
  onStateChange?: (patches: Patch[]) => void
  handlers?: CommandHandlers
}

/**
 * SessionActor - the single writer of one survey session's state.
 *
 * Commands are offered to an unbounded queue and applied one at a time by a
 * single worker, so the state needs no locking. Each command:
 *
 * - is dropped unless it targets the live session (`cmd/initialize` creates
 *   the live session instead);
 * - runs through its handler;
 * - has whatever its handler throws reported as a failure on its own callback,
 *   after which the worker moves on to the next command.
 */
export class SessionActor {
  readonly logger: Logger

  readonly #queue: CommandQueue<SurveyCommand>
  readonly #executor: CommandExecutor
  readonly #update: SessionUpdate
  #state: SessionState | undefined

  constructor({
    logger,
    onStateChange,
    handlers = commandHandlers,
  }: SessionActorParams) {
    this.logger = logger.getChild("actor")
    this.#update = createSessionUpdate({
      logger: this.logger,
      onUpdate: onStateChange,
    })
    this.#executor = new CommandExecutor(handlers, () =>
      this.#buildCommandContext(),
    )
    this.#queue = new CommandQueue<SurveyCommand>({
      process: command => this.#process(command),
      onQuiescent: () => this.logger.trace("command queue drained"),
      onError: (error, command) => {
        this.logger.error("command queue fault on {type}: {error}", {
          type: command?.type,
          error,
        })
      },
    })
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // PUBLIC API
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  /**
   * Offer a command without waiting for it to be applied.
   *
   * @returns false if the actor is closed and the command was rejected
   */
  submit(command: SurveyCommand): boolean {
    return this.#queue.offer(command)
  }

  /**
   * Resolves once every command accepted so far has been applied.
   */
  whenIdle(): Promise<void> {
    return this.#queue.whenIdle()
  }

  /**
   * Reject further commands. Accepted ones still drain.
   */
  close(): void {
    this.#queue.close()
  }

  get isClosed(): boolean {
    return this.#queue.isClosed
  }

  /**
   * The identity of the live session, once one has been initialized.
   */
  get sessionId(): SessionId | undefined {
    return this.#state?.model.sessionId
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // WORKER
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  async #process(command: SurveyCommand): Promise<void> {
    if (command.type !== "cmd/initialize" && !this.#isLive(command.sessionId)) {
      this.logger.debug("dropping {type} for stale session {sessionId}", {
        type: command.type,
        sessionId: command.sessionId,
      })
      return
    }

    this.logger.trace("{type}", {
      type: command.type,
      sessionId: command.sessionId,
    })

    try {
      await this.#executor.execute(command)
    } catch (error) {
      await this.#reportFailure(command, error)
    }
  }

  #isLive(sessionId: SessionId): boolean {
    return this.#state !== undefined && this.#state.model.sessionId === sessionId
  }

  async #reportFailure(command: SurveyCommand, error: unknown): Promise<void> {
    const { callback } = command
    if (!callback) {
      this.logger.error("{type} failed: {error}", { type: command.type, error })
      return
    }

    this.logger.warn("{type} failed: {error}", { type: command.type, error })
    await callback.set(failure(error))
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // COMMAND CONTEXT
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  #buildCommandContext(): CommandContext {
    return {
      state: this.#state,
      logger: this.logger,
      beginState: (sessionId, ephemeralQuestionCell) =>
        this.#beginState(sessionId, ephemeralQuestionCell),
      applyMessage: message => this.#applyMessage(message),
      recomputeAndNotify: () => this.#recomputeAndNotify(),
    }
  }

  #beginState(
    sessionId: SessionId,
    ephemeralQuestionCell: ResultCell<EphemeralSurveyQuestion>,
  ): SessionState {
    const state = { model: sessionInit(sessionId), ephemeralQuestionCell }
    this.#state = state
    return state
  }

  async #applyMessage(message: SessionMessage): Promise<void> {
    const state = this.#requireState()
    const [model, effect] = this.#update(message, state.model)
    this.#state = { ...state, model }

    if (effect?.type === "effect/recompute-and-notify") {
      await this.#recomputeAndNotify()
    }
  }

  async #recomputeAndNotify(): Promise<void> {
    const { model, ephemeralQuestionCell } = this.#requireState()
    await ephemeralQuestionCell.set(computeCurrentQuestion(model))
  }

  #requireState(): SessionState {
    if (!this.#state) {
      throw new SessionNotInitializedError()
    }
    return this.#state
  }
}
