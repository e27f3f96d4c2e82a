// Worker thread entry point loaded by NodeWorkerFactory.

import { parentPort } from "node:worker_threads";
import { portChannel } from "./channel.js";
import { runChild } from "./child.js";
import { NodeWorkerFactory } from "./factory.js";

const port = parentPort;
if (port === null) throw new Error("worker entry must be loaded inside a worker thread");

runChild(portChannel(port), { factory: new NodeWorkerFactory() });
