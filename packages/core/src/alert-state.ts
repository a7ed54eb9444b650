import type { ButtonState } from "./button-state.js"
import type { TextState } from "./text-state.js"
import { generateUUID } from "./utils/generate-uuid.js"

export type AlertStateParams<Action> = {
  id?: string
  title: TextState
  message?: TextState
  buttons?: ButtonState<Action>[]
}

/**
 * A declarative description of an alert, independent of the view layer.
 */
export class AlertState<Action> {
  readonly id: string
  readonly title: TextState
  readonly message: TextState | undefined
  readonly buttons: readonly ButtonState<Action>[]

  constructor({ id, title, message, buttons = [] }: AlertStateParams<Action>) {
    this.id = id ?? generateUUID()
    this.title = title
    this.message = message
    this.buttons = buttons
  }

  /**
   * Two-button alert in the older primary/secondary form.
   */
  static withButtons<Action>({
    title,
    message,
    primaryButton,
    secondaryButton,
  }: {
    title: TextState
    message?: TextState
    primaryButton: ButtonState<Action>
    secondaryButton: ButtonState<Action>
  }): AlertState<Action> {
    return new AlertState({
      title,
      message,
      buttons: [primaryButton, secondaryButton],
    })
  }

  /**
   * Single-button alert. Without a dismiss button the alert has no buttons
   * and the view layer supplies its default "OK".
   */
  static withDismissButton<Action>({
    title,
    message,
    dismissButton,
  }: {
    title: TextState
    message?: TextState
    dismissButton?: ButtonState<Action>
  }): AlertState<Action> {
    return new AlertState({
      title,
      message,
      buttons: dismissButton ? [dismissButton] : [],
    })
  }

  map<NewAction>(
    transform: (action: Action) => NewAction,
  ): AlertState<NewAction> {
    return new AlertState<NewAction>({
      id: this.id,
      title: this.title,
      message: this.message,
      buttons: this.buttons.map(button => button.map(transform)),
    })
  }
}
