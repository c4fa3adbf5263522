export * from './types'
export { compileScore, compileEvents, DRUM_HIT_SECONDS } from './compile'
export { assignChannels, melodicChannel, DRUM_CHANNEL, MAX_CHANNEL } from './channels'
