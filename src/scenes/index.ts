export { ViewerScene } from "./ViewerScene";
