export interface ControllerOptions {
  /**
   * Milliseconds between the end of one reconciliation and the start of the next.
   */
  interval: number
}
