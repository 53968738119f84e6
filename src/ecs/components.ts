import { Types, defineComponent } from 'bitecs'

// Anchor + extent of the cells an entity covers.
export const Footprint = defineComponent({
  x: Types.i32,
  y: Types.i32,
  width: Types.i32,
  height: Types.i32,
})

// Only mortal entities carry this component.
export const Lifespan = defineComponent({
  remaining: Types.f64,
})
