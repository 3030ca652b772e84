export { LcgScene } from "./LcgScene";
