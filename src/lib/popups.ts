// src/lib/popups.ts
import type { EventBus, PopupKind } from './bus.js';

export const POPUPS: readonly PopupKind[] = ['bluetooth', 'wifi', 'media-control', 'power'];

export function isPopupKind(v: string): v is PopupKind {
  return POPUPS.some(p => p === v);
}

/**
 * Tracks which popups are open from the requested/closed events on the bus,
 * so a toggle can publish the opposite of the current visibility.
 */
export class PopupTracker {
  private readonly open = new Set<PopupKind>();
  private readonly unlisten: () => void;

  constructor(private readonly bus: EventBus) {
    this.unlisten = bus.listen(e => {
      if (e.type === 'popup/requested') this.open.add(e.popup);
      else if (e.type === 'popup/closed') this.open.delete(e.popup);
    });
  }

  isOpen(popup: PopupKind): boolean {
    return this.open.has(popup);
  }

  show(popup: PopupKind): void {
    this.open.add(popup);
    this.bus.publish({ type: 'popup/requested', popup });
  }

  hide(popup: PopupKind): void {
    this.open.delete(popup);
    this.bus.publish({ type: 'popup/closed', popup });
  }

  /** Returns whether the popup is now requested open. */
  toggle(popup: PopupKind): boolean {
    if (this.open.has(popup)) {
      this.hide(popup);
      return false;
    }
    this.show(popup);
    return true;
  }

  dispose(): void {
    this.unlisten();
  }
}
