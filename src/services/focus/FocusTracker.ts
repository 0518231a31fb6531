import { StructuredLogger } from '../../logging/StructuredLogger';
import { FocusProbe, LiveFocus } from '../../core/contracts';
import { DeliveryDecision, FocusComparison, FocusSnapshot } from '../../types';

export const compareFocus = (snapshot: FocusSnapshot, live: LiveFocus | undefined): FocusComparison => {
  if (!live || live.pid === undefined || snapshot.pid === undefined) {
    return 'differentApp';
  }

  if (live.pid !== snapshot.pid) {
    return 'differentApp';
  }

  if (snapshot.windowId !== undefined && live.windowId !== undefined) {
    return snapshot.windowId === live.windowId ? 'same' : 'differentWindowSameApp';
  }

  if (snapshot.title !== undefined && live.title !== undefined && snapshot.title !== live.title) {
    return 'differentWindowSameApp';
  }

  return 'same';
};

/**
 * Where the final text may go. An unanswered focus query on either end never pastes:
 * the text stays in the clipboard instead.
 */
export const decideDelivery = (snapshot: FocusSnapshot, live: LiveFocus | undefined): DeliveryDecision => {
  if (!live || live.pid === undefined || snapshot.pid === undefined) {
    return { action: 'clipboardOnly', reason: 'focus-unknown' };
  }

  const comparison = compareFocus(snapshot, live);
  if (comparison === 'same') {
    return { action: 'paste' };
  }

  if (comparison === 'differentApp') {
    return { action: 'restoreAndPaste' };
  }

  return { action: 'clipboardOnly', reason: 'focus-moved-within-app' };
};

export class FocusTracker {
  public constructor(
    private readonly probe: FocusProbe,
    private readonly logger?: StructuredLogger
  ) {}

  public async captureFocus(): Promise<FocusSnapshot> {
    const capturedAt = Date.now();
    const live = await this.queryLive();
    if (!live) {
      return { capturedAt };
    }

    return { ...live, capturedAt };
  }

  public async hasFocusChanged(snapshot: FocusSnapshot): Promise<FocusComparison> {
    return compareFocus(snapshot, await this.queryLive());
  }

  public async resolveDelivery(snapshot: FocusSnapshot): Promise<DeliveryDecision> {
    const live = await this.queryLive();
    const decision = decideDelivery(snapshot, live);
    this.logger?.info('Delivery target resolved', {
      action: decision.action,
      snapshotPid: snapshot.pid,
      snapshotWindowId: snapshot.windowId,
      livePid: live?.pid,
      liveWindowId: live?.windowId
    });
    return decision;
  }

  public async restore(snapshot: FocusSnapshot): Promise<void> {
    if (!snapshot.handle && snapshot.pid === undefined) {
      return;
    }

    try {
      await this.probe.activate(snapshot);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.debug('Focus restore failed', { detail, appName: snapshot.appName });
    }
  }

  private async queryLive(): Promise<LiveFocus | undefined> {
    try {
      return await this.probe.query();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.debug('Focus query failed', { detail });
      return undefined;
    }
  }
}
