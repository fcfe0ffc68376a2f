import type { Logger } from "@logtape/logtape"
import type { ResultCell } from "@questline/providers"
import type { CommandOfType, SurveyCommand, SurveyCommandType } from "./commands.js"
import type { SessionMessage, SessionModel } from "./session-program.js"
import type { EphemeralSurveyQuestion, SessionId } from "./types.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// TYPES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * The live state of one session: its model plus the cell its current
 * question is published to.
 *
 * Not safe for concurrent use; only the session actor's worker touches it.
 */
export type SessionState = {
  readonly model: SessionModel
  readonly ephemeralQuestionCell: ResultCell<EphemeralSurveyQuestion>
}

/**
 * Context provided to command handlers.
 *
 * Created fresh for every command so handlers always see the latest state.
 */
export type CommandContext = {
  /** The live session state, if a session has been initialized */
  readonly state: SessionState | undefined

  readonly logger: Logger

  /** Replace the live state with a fresh one for `sessionId` */
  readonly beginState: (
    sessionId: SessionId,
    ephemeralQuestionCell: ResultCell<EphemeralSurveyQuestion>,
  ) => SessionState

  /** Run a message through the session update function, then its effect */
  readonly applyMessage: (message: SessionMessage) => Promise<void>

  /** Re-derive the current question and publish it */
  readonly recomputeAndNotify: () => Promise<void>
}

/**
 * A command handler function.
 *
 * @template T - The specific command type this handler processes
 */
export type CommandHandler<T extends SurveyCommand = SurveyCommand> = (
  command: T,
  ctx: CommandContext,
) => Promise<void>

/**
 * One handler for every command type.
 */
export type CommandHandlers = {
  [K in SurveyCommandType]: CommandHandler<CommandOfType<K>>
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// COMMAND EXECUTOR
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * CommandExecutor - Executes commands using a registry of handlers.
 *
 * @example
 * ```typescript
 * const executor = new CommandExecutor(commandHandlers, () =>
 *   actor.buildCommandContext(),
 * )
 *
 * await executor.execute({ type: "cmd/recompute-and-notify", sessionId })
 * ```
 */
export class CommandExecutor {
  readonly #handlers: CommandHandlers
  readonly #contextProvider: () => CommandContext

  constructor(handlers: CommandHandlers, contextProvider: () => CommandContext) {
    this.#handlers = handlers
    this.#contextProvider = contextProvider
  }

  /**
   * Execute a command by looking up its handler and invoking it.
   * Whatever the handler throws is passed on to the caller.
   */
  async execute(command: SurveyCommand): Promise<void> {
    await this.#run(command.type, command)
  }

  async #run<K extends SurveyCommandType>(
    type: K,
    command: CommandOfType<K>,
  ): Promise<void> {
    const handler: CommandHandler<CommandOfType<K>> = this.#handlers[type]
    await handler(command, this.#contextProvider())
  }
}
