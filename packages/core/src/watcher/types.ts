/** Edge-triggered "the snippet directory changed" signal. Carries no payload. */
export type ChangeListener = () => void;

/**
 * Source of directory change signals. Duplicate and late signals are
 * harmless: every signal ends in a reload of current disk state.
 */
export interface ChangeWatcher {
  start(onChange: ChangeListener): void;
  close(): void;
}
