export { createFileSink } from './file-sink';
export type { FileSinkDependencies } from './file-sink';
