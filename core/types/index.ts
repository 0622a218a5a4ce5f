export type * from './command';
export type * from './events';
export type * from './message';
export type * from './slash-command';
export type {
  CaptionSource,
  CommandHandlerPlugin,
  Logger,
  MessageHandlerPlugin,
  MessageHandlerScope,
  Plugin,
  PluginContext,
  PluginType,
} from './plugin';
export { isMessageHandler, isPlugin } from './plugin';
