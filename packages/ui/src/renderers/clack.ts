import { spinner } from '@clack/prompts';
import { UpdateType, type ProgressConsumer, type ProgressState, type ProgressUpdate } from '@progresskit/core';

export interface ClackProgressConsumerOptions {
  /** Overrides the emitter label in the spinner line. */
  title?: string | undefined;
  showCount?: boolean | undefined;
  showPercentage?: boolean | undefined;
}

type Spinner = ReturnType<typeof spinner>;

/**
 * Renders an emitter as a clack spinner line, e.g. `Pages 3/12 (25%)`.
 * The spinner starts on the first update, restarts when the total changes
 * and stops with a summary on completion.
 */
export class ClackProgressConsumer implements ProgressConsumer {
  private active: Spinner | undefined;

  constructor(private readonly options: ClackProgressConsumerOptions = {}) {}

  onProgress(update: ProgressUpdate): void {
    const message = this.format(update.state);

    if (this.active && update.updateType === UpdateType.TOTAL_CHANGED) {
      this.active.stop();
      this.active = undefined;
    }

    if (!this.active) {
      this.active = spinner();
      this.active.start(message);
      return;
    }

    this.active.message(message);
  }

  onComplete(state: ProgressState): void {
    this.active?.stop(`${this.titleFor(state)} complete (${state.current} items)`);
    this.active = undefined;
  }

  private titleFor(state: ProgressState): string {
    return this.options.title ?? state.label ?? 'Processing';
  }

  private format(state: ProgressState): string {
    const title = this.titleFor(state);
    if (state.total === null) {
      return `${title} ${state.current} items`;
    }

    const parts = [title];
    if (this.options.showCount !== false) {
      parts.push(`${state.current}/${state.total}`);
    }
    if (this.options.showPercentage !== false) {
      parts.push(`(${Math.round(state.percentage ?? 0)}%)`);
    }
    return parts.join(' ');
  }
}
