export type { ScreenPoint, MatchResult, ObservedMuteState, GrayImage, Template } from './common';
export type { AdMuteUserConfig, AdMuteAppConstants, AdMuteConfig } from './config';
