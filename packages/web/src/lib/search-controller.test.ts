import { describe, expect, it, vi } from 'vitest'
import { SearchController } from './search-controller'

describe('SearchController', () => {
  it('starts closed', () => {
    expect(new SearchController().getSnapshot()).toEqual({ open: false })
  })

  it('notifies listeners on every change', () => {
    const controller = new SearchController()
    const listener = vi.fn()
    controller.subscribe(listener)

    controller.open()
    controller.toggle()
    controller.toggle()

    expect(listener).toHaveBeenCalledTimes(3)
    expect(controller.getSnapshot()).toEqual({ open: true })
  })

  it('skips notification when the state does not change', () => {
    const controller = new SearchController()
    const listener = vi.fn()
    controller.subscribe(listener)

    controller.close()

    expect(listener).not.toHaveBeenCalled()
  })

  it('stops notifying after unsubscribe', () => {
    const controller = new SearchController()
    const listener = vi.fn()
    const unsubscribe = controller.subscribe(listener)

    unsubscribe()
    controller.open()

    expect(listener).not.toHaveBeenCalled()
  })

  it('returns a new snapshot object per change', () => {
    const controller = new SearchController()
    const before = controller.getSnapshot()

    controller.open()

    expect(controller.getSnapshot()).not.toBe(before)
  })
})
