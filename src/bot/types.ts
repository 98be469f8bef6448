// src/bot/types.ts
import { Context } from 'telegraf';
import { BuildSession } from '../build/build.state-machine';

// Per-chat transient state, kept by telegraf's session() middleware
export interface BotSession {
  build?: BuildSession;
}

export interface MyContext extends Context {
  session: BotSession;
}
