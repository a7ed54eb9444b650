import type { TextState } from "./text-state.js"
import { generateUUID } from "./utils/generate-uuid.js"

export type ButtonStateRole = "cancel" | "destructive"

/**
 * What tapping a button does: send an action (optionally animated), or
 * nothing when `action` is absent.
 */
export type ButtonStateAction<Action> =
  | { type: "send"; action?: Action }
  | { type: "animatedSend"; action?: Action; animation: string }

export const ButtonStateAction = {
  send<Action>(action?: Action): ButtonStateAction<Action> {
    return { type: "send", action }
  },

  animatedSend<Action>(
    action: Action | undefined,
    animation: string,
  ): ButtonStateAction<Action> {
    return { type: "animatedSend", action, animation }
  },
}

export type ButtonStateParams<Action> = {
  id?: string
  role?: ButtonStateRole
  action?: ButtonStateAction<Action>
  label: () => TextState
}

/**
 * A declarative description of a dialog button.
 *
 * @example
 * ```typescript
 * new ButtonState({
 *   role: "destructive",
 *   action: ButtonStateAction.send({ type: "deleteConfirmed" }),
 *   label: () => new TextState("Delete"),
 * })
 * ```
 */
export class ButtonState<Action> {
  readonly id: string
  readonly role: ButtonStateRole | undefined
  readonly action: ButtonStateAction<Action>
  readonly label: TextState

  constructor({ id, role, action, label }: ButtonStateParams<Action>) {
    this.id = id ?? generateUUID()
    this.role = role
    this.action = action ?? ButtonStateAction.send<Action>()
    this.label = label()
  }

  /**
   * Hands the button's action to `perform`, if it has one.
   */
  withAction(perform: (action: Action) => void): void {
    if (this.action.action === undefined) return
    perform(this.action.action)
  }

  map<NewAction>(
    transform: (action: Action) => NewAction,
  ): ButtonState<NewAction> {
    const current = this.action
    const action =
      current.action === undefined ? undefined : transform(current.action)
    return new ButtonState<NewAction>({
      id: this.id,
      role: this.role,
      action:
        current.type === "send"
          ? ButtonStateAction.send(action)
          : ButtonStateAction.animatedSend(action, current.animation),
      label: () => this.label,
    })
  }
}
