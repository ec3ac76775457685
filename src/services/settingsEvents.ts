import { EventEmitter } from 'events';
import { SettingsChangedEvent } from '../types/Show';

type Listener = (event: SettingsChangedEvent) => void;

const emitter = new EventEmitter();

export const settingsEvents = {
  emitChanged: (event: SettingsChangedEvent): void => {
    emitter.emit('settingsChanged', event);
  },

  onChanged: (listener: Listener): (() => void) => {
    emitter.on('settingsChanged', listener);
    return () => {
      emitter.off('settingsChanged', listener);
    };
  },

  removeAll: (): void => {
    emitter.removeAllListeners('settingsChanged');
  },
};
