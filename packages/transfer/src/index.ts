export {
  TransferOrchestrator,
  DEFAULT_PLANES,
  type CollectResult,
  type DeliverOptions,
  type SketchGateway
} from "./TransferOrchestrator.js";
export { selectAllSketches, type SketchSelector } from "./SketchSelector.js";
