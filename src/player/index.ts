export { Player } from "./Player";
