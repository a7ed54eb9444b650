/**
 * A description of user-facing text, independent of the view layer.
 */
export class TextState {
  constructor(readonly content: string) {}

  equals(other: TextState): boolean {
    return this.content === other.content
  }

  toString(): string {
    return this.content
  }
}
