// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EventEmitter } from 'node:events';
import { Session } from '../session';

/** Event definitions for channel events */
export interface ChannelEvents {
  warning(text: string, msec: number): void;
  error(text: string, msec: number): void;
  message(text: string, msec: number): void;
  debug(text: string, msec: number): void;
}

/**
 * @internal
 *
 * Tracks timing of events
*/
export class Stopwatch {
  start: number;
  last: number;
  constructor() {
    this.last = this.start = process.uptime() * 1000;
  }
  get time() {
    const now = process.uptime() * 1000;
    const result = Math.floor(now - this.last);
    this.last = now;
    return result;
  }
  get total() {
    const now = process.uptime() * 1000;
    return Math.floor(now - this.start);
  }
}

/** Exposes a set of events that are used to communicate with the user
 *
 * Warning, Error, Message, Debug
 */
export class Channels extends EventEmitter {
  /** @internal */
  readonly stopwatch: Stopwatch;

  #send(event: keyof ChannelEvents, text: string | Array<string>) {
    for (const each of typeof text === 'string' ? [text] : text) {
      this.emit(event, each, this.stopwatch.total);
    }
  }

  warning(text: string | Array<string>) {
    this.#send('warning', text);
  }
  error(text: string | Array<string>) {
    this.#send('error', text);
  }
  message(text: string | Array<string>) {
    this.#send('message', text);
  }
  debug(text: string | Array<string>) {
    this.#send('debug', text);
  }
  constructor(session: Session) {
    super();
    this.stopwatch = session.stopwatch;
  }
}
