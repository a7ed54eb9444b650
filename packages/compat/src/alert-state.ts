import { AlertState, type ButtonState, TextState } from "@composable-compat/core"

export type AlertWithButtonsParams<Action> = {
  title: string
  message?: string
  primaryButton: ButtonState<Action>
  secondaryButton: ButtonState<Action>
}

export type AlertParams = {
  title: string
  message?: string
}

/**
 * Builds an alert from plain strings.
 *
 * With `primaryButton` and `secondaryButton` this is a two-button alert;
 * without, it has no buttons and the view supplies its default dismissal.
 */
export function alertState<Action>(
  params: AlertWithButtonsParams<Action>,
): AlertState<Action>
export function alertState<Action = never>(
  params: AlertParams,
): AlertState<Action>
export function alertState<Action>(
  params: AlertWithButtonsParams<Action> | AlertParams,
): AlertState<Action> {
  const title = new TextState(params.title)
  const message =
    params.message === undefined ? undefined : new TextState(params.message)

  if ("primaryButton" in params) {
    return AlertState.withButtons({
      title,
      message,
      primaryButton: params.primaryButton,
      secondaryButton: params.secondaryButton,
    })
  }

  return AlertState.withDismissButton<Action>({ title, message })
}
