/**
 * Script Callback Registry
 *
 * Lifecycle callbacks the host fires around a game session:
 * - **onGameStart** fires once when scripts load
 * - **actorFirstUpdate** fires on the first update after the actor spawns
 * - **onGameEnd** fires when the session is torn down
 *
 * Callbacks are keyed by an id so a script can unregister what it added.
 */

// ============================================================================
// Callback Types
// ============================================================================

export type ScriptCallback = () => void

export type ScriptCallbackId = 'onGameStart' | 'actorFirstUpdate' | 'onGameEnd'

/**
 * What the prefetch coordinator needs from the host's callback system
 */
export interface ScriptCallbacks {
  register(hook: ScriptCallbackId, id: string, handler: ScriptCallback, priority?: number): void
  unregister(id: string): void
}

// ============================================================================
// Callback Entry (handler + metadata)
// ============================================================================

interface CallbackEntry {
  id: string
  handler: ScriptCallback
  priority: number
}

// ============================================================================
// ScriptCallbackRegistry
// ============================================================================

export class ScriptCallbackRegistry implements ScriptCallbacks {
  private _onGameStart: CallbackEntry[] = []
  private _actorFirstUpdate: CallbackEntry[] = []
  private _onGameEnd: CallbackEntry[] = []

  /**
   * Register a handler for a callback. A second registration of the same id
   * on the same callback is ignored.
   */
  register(hook: ScriptCallbackId, id: string, handler: ScriptCallback, priority = 0): void {
    const list = this._getList(hook)
    if (list.some(e => e.id === id)) return
    list.push({ id, handler, priority })
    // Sort by priority (lower runs first)
    if (list.length > 1) {
      list.sort((a, b) => a.priority - b.priority)
    }
  }

  /** Unregister all handlers with a given id */
  unregister(id: string): void {
    this._onGameStart = this._onGameStart.filter(e => e.id !== id)
    this._actorFirstUpdate = this._actorFirstUpdate.filter(e => e.id !== id)
    this._onGameEnd = this._onGameEnd.filter(e => e.id !== id)
  }

  /** Remove all registered handlers */
  clear(): void {
    this._onGameStart.length = 0
    this._actorFirstUpdate.length = 0
    this._onGameEnd.length = 0
  }

  /**
   * Run every handler for a callback. Iterates a snapshot, so handlers may
   * unregister themselves (or register others) while firing.
   */
  fire(hook: ScriptCallbackId): void {
    for (const entry of this._getList(hook).slice()) {
      entry.handler()
    }
  }

  // --- Query helpers ---

  hasHandlers(hook: ScriptCallbackId): boolean {
    return this._getList(hook).length > 0
  }

  private _getList(hook: ScriptCallbackId): CallbackEntry[] {
    switch (hook) {
      case 'onGameStart': return this._onGameStart
      case 'actorFirstUpdate': return this._actorFirstUpdate
      case 'onGameEnd': return this._onGameEnd
    }
  }
}
