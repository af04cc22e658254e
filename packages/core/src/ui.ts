export { ui } from "./widgets/ui.js";
