import { CombatEventBus } from './EventBus';

export type LogClass = 'normal' | 'dice' | 'hit' | 'sustain' | 'retreat' | 'result' | 'system' | 'warn';

const CLASS_MAP: Record<LogClass, string> = {
  normal:  'le',
  dice:    'ld',
  hit:     'lh',
  sustain: 'lsu',
  retreat: 'lr',
  result:  'lres',
  system:  'ls',
  warn:    'lw',
};

export const Logger = {
  /** Console echo; hosts that only consume `logMessage` events can switch it off */
  echo: true,

  log(text: string, type: LogClass = 'normal'): void {
    if (Logger.echo) {
      if (type === 'warn') console.warn(`[${type.toUpperCase()}] ${text}`);
      else console.log(`[${type.toUpperCase()}] ${text}`);
    }
    CombatEventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },
};
