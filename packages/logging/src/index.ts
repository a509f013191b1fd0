export { createLogger } from './pino.js'
export { makeClientBuffer } from './buffer.js'
export { CHANNELS, isLogChannel } from './channels.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogLevel,
    type LoggerBundle,
} from './types.js'
