import {
  ButtonState,
  ButtonStateAction,
  type ButtonStateRole,
  TextState,
} from "@composable-compat/core"

function button<Action>(
  role: ButtonStateRole | undefined,
  label: string,
  send: Action | undefined,
): ButtonState<Action> {
  return new ButtonState<Action>({
    role,
    action: ButtonStateAction.send(send),
    label: () => new TextState(label),
  })
}

/**
 * Role-named button constructors.
 *
 * @example
 * ```typescript
 * alertState({
 *   title: "Delete draft?",
 *   primaryButton: buttonState.destructive("Delete", { type: "deleteConfirmed" }),
 *   secondaryButton: buttonState.cancel("Keep"),
 * })
 * ```
 */
export const buttonState = {
  cancel<Action = never>(label: string, send?: Action): ButtonState<Action> {
    return button("cancel", label, send)
  },

  default<Action = never>(label: string, send?: Action): ButtonState<Action> {
    return button(undefined, label, send)
  },

  destructive<Action = never>(
    label: string,
    send?: Action,
  ): ButtonState<Action> {
    return button("destructive", label, send)
  },
}
