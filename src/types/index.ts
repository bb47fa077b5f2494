export type * from './repo.js'
export type * from './progress.js'
export type * from './report.js'
