export { GameScene } from "./GameScene";
