/**
 * Input Channel — the outside world touching the core
 *
 * A stimulus always arrives with attention: someone is there. The
 * channel ticks the core through the shared handle, so it waits its
 * turn behind any life-loop tick already holding the lock, and hands
 * the resulting snapshot straight back to the caller.
 */

import { Snapshot } from '../core/types';
import { InputError } from '../core/errors';
import { SignalMapper } from '../signals/mapper';
import { CoreHandle } from './core-handle';

export class InputChannel {
  private totalStimuli = 0;
  private lastStimulusAt: number | null = null;

  constructor(
    private readonly handle: CoreHandle,
    private readonly mapper?: SignalMapper,
  ) {}

  /**
   * Feed a numeric signal. Out-of-range values are clamped by the core.
   * @throws {InputError} code=INVALID_SIGNAL if signal is not a number.
   */
  async submit(signal: number): Promise<Snapshot> {
    if (typeof signal !== 'number' || Number.isNaN(signal)) {
      throw new InputError(`Signal must be a number, got ${String(signal)}`, 'INVALID_SIGNAL');
    }

    const snapshot = await this.handle.tick(signal, true, 'input');
    this.totalStimuli++;
    this.lastStimulusAt = snapshot.time;
    return snapshot;
  }

  /**
   * Map text to a signal with the configured mapper, then submit it.
   * @throws {InputError} code=NO_MAPPER if the channel was built without one.
   */
  async submitText(text: string): Promise<Snapshot> {
    if (!this.mapper) {
      throw new InputError('No signal mapper configured for text input', 'NO_MAPPER');
    }
    return this.submit(this.mapper.map(text));
  }

  getStats(): { totalStimuli: number; lastStimulusAt: number | null } {
    return { totalStimuli: this.totalStimuli, lastStimulusAt: this.lastStimulusAt };
  }
}
