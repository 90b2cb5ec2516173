/**
 * Mute decision type definitions
 */

/**
 * What the controller should ask the actuator to do this cycle
 */
export type MuteAction = 'mute' | 'unmute' | 'none';
