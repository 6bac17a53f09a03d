export const CATALOG_SOURCE_PORT = Symbol('CATALOG_SOURCE_PORT');
export const CATALOG_SNAPSHOT_REPOSITORY_PORT = Symbol('CATALOG_SNAPSHOT_REPOSITORY_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
export const CLOCK_PORT = Symbol('CLOCK_PORT');
export const TASK_TIMER_PORT = Symbol('TASK_TIMER_PORT');
