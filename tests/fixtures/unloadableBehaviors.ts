const missing = (): never => {
  throw new Error('missing dependency')
}

export const behaviors = missing()
