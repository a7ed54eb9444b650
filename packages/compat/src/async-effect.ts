import { getLogger, type Logger } from "@logtape/logtape"
import {
  type CatchHandler,
  Effect,
  isCancellation,
  type TaskPriority,
} from "@composable-compat/core"

export type AsyncEffectOptions<Action> = {
  priority?: TaskPriority
  /**
   * Receives every failure except cancellation. Without a handler, failures
   * are dropped.
   */
  catch?: CatchHandler<Action>
  logger?: Logger
}

/**
 * An effect that awaits a single action and sends it.
 *
 * @example
 * ```typescript
 * case "loadTapped":
 *   return asyncEffect(
 *     async () => ({ type: "loaded", items: await api.fetchItems() }),
 *     { catch: (error, send) => send({ type: "loadFailed" }) },
 *   )
 * ```
 */
export function asyncEffect<Action>(
  action: (signal: AbortSignal) => Promise<Action>,
  options: AsyncEffectOptions<Action> = {},
): Effect<Action> {
  const { priority, catch: handler } = options
  const logger = (
    options.logger ?? getLogger(["@composable-compat", "compat"])
  ).getChild("async-effect")

  return Effect.run<Action>(
    async (send, signal) => {
      try {
        send(await action(signal))
      } catch (error) {
        if (isCancellation(error)) return
        if (!handler) {
          logger.debug("dropping failure without a catch handler: {error}", {
            error,
          })
          return
        }
        await handler(error, send)
      }
    },
    { priority },
  )
}
