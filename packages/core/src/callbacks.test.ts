/**
 * Script Callback Registry Tests
 */

import { describe, test, expect, beforeEach } from 'vitest'
import { ScriptCallbackRegistry } from './callbacks'

describe('ScriptCallbackRegistry', () => {
  let callbacks: ScriptCallbackRegistry

  beforeEach(() => {
    callbacks = new ScriptCallbackRegistry()
  })

  test('fire runs handlers in priority order (lower first)', () => {
    const order: string[] = []
    callbacks.register('onGameStart', 'late', () => order.push('late'), 10)
    callbacks.register('onGameStart', 'early', () => order.push('early'), -5)
    callbacks.register('onGameStart', 'default', () => order.push('default'))

    callbacks.fire('onGameStart')

    expect(order).toEqual(['early', 'default', 'late'])
  })

  test('fire only runs handlers of the fired callback', () => {
    const fired: string[] = []
    callbacks.register('onGameStart', 'a', () => fired.push('start'))
    callbacks.register('actorFirstUpdate', 'a', () => fired.push('first-update'))

    callbacks.fire('actorFirstUpdate')

    expect(fired).toEqual(['first-update'])
  })

  test('duplicate id on the same callback is ignored', () => {
    let calls = 0
    callbacks.register('actorFirstUpdate', 'prefetch', () => calls++)
    callbacks.register('actorFirstUpdate', 'prefetch', () => calls++)

    callbacks.fire('actorFirstUpdate')

    expect(calls).toBe(1)
  })

  test('unregister removes the id from every callback', () => {
    callbacks.register('onGameStart', 'mod', () => {})
    callbacks.register('onGameEnd', 'mod', () => {})
    callbacks.register('onGameEnd', 'other', () => {})

    callbacks.unregister('mod')

    expect(callbacks.hasHandlers('onGameStart')).toBe(false)
    expect(callbacks.hasHandlers('onGameEnd')).toBe(true)
  })

  test('handler can unregister itself while firing', () => {
    let selfCalls = 0
    let otherCalls = 0
    callbacks.register('actorFirstUpdate', 'once', () => {
      selfCalls++
      callbacks.unregister('once')
    })
    callbacks.register('actorFirstUpdate', 'always', () => otherCalls++, 1)

    callbacks.fire('actorFirstUpdate')
    callbacks.fire('actorFirstUpdate')

    expect(selfCalls).toBe(1)
    expect(otherCalls).toBe(2)
  })

  test('handler registered while firing waits for the next fire', () => {
    let lateCalls = 0
    callbacks.register('onGameStart', 'installer', () => {
      callbacks.register('onGameStart', 'late', () => lateCalls++)
    })

    callbacks.fire('onGameStart')
    expect(lateCalls).toBe(0)

    callbacks.fire('onGameStart')
    expect(lateCalls).toBe(1)
  })

  test('clear removes all handlers', () => {
    callbacks.register('onGameStart', 'a', () => {})
    callbacks.register('actorFirstUpdate', 'b', () => {})
    callbacks.clear()

    expect(callbacks.hasHandlers('onGameStart')).toBe(false)
    expect(callbacks.hasHandlers('actorFirstUpdate')).toBe(false)
  })
})
