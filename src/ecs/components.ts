import { Types, defineComponent } from 'bitecs'

// Resource values and health are whole units. Uint32 stores wrap on negative
// writes, so every decrement goes through saturatingSub first.

export const CellMeta = defineComponent({
  id: Types.ui32,
})

export const CellStock = defineComponent({
  curResource: Types.ui32,
  maxResource: Types.ui32,
  regenRate: Types.ui32,
  maxRegenRate: Types.ui32,
})

export const AgentMeta = defineComponent({
  id: Types.ui32,
})

// Foreign key into SimulationContext.cells; the agent never owns its cell.
export const Occupancy = defineComponent({
  cid: Types.ui32,
})

export const Metabolism = defineComponent({
  consumptionRate: Types.ui32,
  allocatedResource: Types.ui32,
})

export const Vitality = defineComponent({
  healthPoint: Types.ui32,
  alive: Types.ui8,
})
