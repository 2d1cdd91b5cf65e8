import type { GameOptions } from "@/types";
import Phaser from "phaser";

/**
 * Default game options
 */
export const DEFAULT_GAME_OPTIONS: GameOptions = {
  width: 1280,
  height: 720,
  backgroundColor: 0x101018,
  /** Force the Canvas renderer instead of WebGL */
  forceCanvas: false,
};

/**
 * Creates the Phaser game configuration
 */
export function createGameConfig(
  scenes: Phaser.Types.Scenes.SceneType[],
  options: Partial<GameOptions> = {}
): Phaser.Types.Core.GameConfig {
  const opts = { ...DEFAULT_GAME_OPTIONS, ...options };

  return {
    type: opts.forceCanvas ? Phaser.CANVAS : Phaser.AUTO,
    width: opts.width,
    height: opts.height,
    backgroundColor: opts.backgroundColor,
    parent: "game-container",
    scene: scenes,
    scale: {
      mode: Phaser.Scale.FIT,
      autoCenter: Phaser.Scale.CENTER_BOTH,
    },
    render: {
      antialias: true,
      pixelArt: false,
      roundPixels: false,
    },
  };
}
