#!/usr/bin/env node
import { isDirectExecution, main } from "./src/index.js";

export { main };

// Allow `node dist/index.js` and the installed `hdlflow` symlink
if (isDirectExecution(import.meta.url, process.argv[1])) {
  main(process.argv).catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
