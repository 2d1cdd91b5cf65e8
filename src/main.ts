import Phaser from "phaser";
import { createGameConfig } from "@/config/gameConfig";
import { CameraDebugLogger } from "@/debug/CameraDebugLogger";
import { ViewerScene } from "@/scenes";

/**
 * Main entry point for the hypercam viewer
 */

// Expose the logger for use from the browser console
Object.assign(window, { CameraDebugLogger });

new Phaser.Game(createGameConfig([ViewerScene]));
