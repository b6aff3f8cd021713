import { writable } from 'svelte/store'

import type { ControlState } from '@/types/sim'
import { DEFAULT_CONTROLS } from '@/types/sim'

export function createControlStore(initial: ControlState = DEFAULT_CONTROLS) {
  const store = writable<ControlState>({ ...initial })

  return {
    subscribe: store.subscribe,
    set: store.set,
    updateControls(patch: Partial<ControlState>) {
      store.update((current) => ({ ...current, ...patch }))
    },
    togglePause() {
      store.update((current) => ({ ...current, paused: !current.paused }))
    },
  }
}

export type ControlStore = ReturnType<typeof createControlStore>
