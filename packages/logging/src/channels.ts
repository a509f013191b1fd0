import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.host]:        { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:         { emoji: '📦', color: 'blue' },
    [LogChannel.request]:     { emoji: '📝', color: 'purple' },
    [LogChannel.serial]:      { emoji: '🔌', color: 'yellow' },
    [LogChannel.session]:     { emoji: '🔗', color: 'cyan' },
    [LogChannel.sync]:        { emoji: '🔄', color: 'green' },
    // Generic device marker (real hardware lines)
    [LogChannel.device]:      { emoji: '🛠️', color: 'red' },
    [LogChannel.simulator]:   { emoji: '🧪', color: 'magenta' },
    [LogChannel.dispatcher]:  { emoji: '🎛️', color: 'white' },
    [LogChannel.message_bus]: { emoji: '📬', color: 'white' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export function isLogChannel(value: string): value is LogChannel {
    return Object.prototype.hasOwnProperty.call(CHANNELS, value)
}
