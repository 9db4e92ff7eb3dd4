export type { OutputSink } from "./sink.js";
export { FileSink, StringSink } from "./sink.js";
export {
  XML_PROLOG,
  render,
  renderDocument,
  renderFragment,
  renderNode,
  renderToString,
} from "./render-svg.js";
