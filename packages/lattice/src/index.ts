export * from './bonds'
export * from './builders'
export * from './compare'
export * from './config'
export * from './errors'
export * from './logger'
export * from './region'
export * from './replicate'
export * from './scene'
export * from './species'
export * from './summary'
export * from './unit-cell'
export * from './vector'
export * from './view-frame'
export * from './wire'
