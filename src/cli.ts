#!/usr/bin/env tsx

// PATH may be minimal when launched detached or from cron
const additionalPaths = "/usr/local/bin:/usr/bin:/bin:/usr/sbin:/sbin";
process.env.PATH = `${additionalPaths}:${process.env.PATH || ""}`;

import { createContext } from "./lib/context";
import { buildProgram } from "./program";

await buildProgram(() => createContext()).parseAsync();
