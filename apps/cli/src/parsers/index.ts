export { expandHostlist, expandRangeList, compareHostnames } from "./hostlist.ts";
export { decodeRunLength, sumRunLength } from "./run-length.ts";
export { parseTresLimits } from "./tres.ts";
export { parseSqueue, splitDelimitedRows, buildSqueueFormat } from "./squeue.ts";
export { parseNodeCpus, parseJobLayouts } from "./scontrol.ts";
export { parseAssociations } from "./sacctmgr.ts";
