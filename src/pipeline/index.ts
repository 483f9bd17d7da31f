export {
  parseAndReport,
  readInputFile,
  tallyFile,
  type TallyRunOptions,
  type TallyReport,
} from "./pipeline.js";
