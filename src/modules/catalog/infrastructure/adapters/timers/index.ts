export { NodeTaskTimer } from './node-task-timer';
export { SystemClock } from './system-clock';
