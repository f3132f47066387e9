import { makeSessionCollector } from './Collector/index'

export * from './Collector/index'
export * from './Types/index'
export * from './Defaults/index'
export * from './Utils/index'

export default makeSessionCollector
