/**
 * Shared application state handed to every request
 */
export class State<S> {
  constructor(private readonly value: S) {}

  get(): S {
    return this.value
  }
}
