export { runWorkerPool, type PoolWorker } from "./pool.js";
