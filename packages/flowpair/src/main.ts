import { exit } from "node:process";
import { createNodeClock, createNodeSurface } from "@flowpair/node";
import { runFlowpair } from "./app.js";

exit(
  await runFlowpair({
    env: process.env,
    createSurface: (title) => createNodeSurface({ title }),
    clock: createNodeClock(),
    writeError: (line) => {
      process.stderr.write(line);
    },
  }),
);
