// connection.ts - ChatConnection: binds one browser WebSocket to one Session.

import { MSG, SAMPLE_RATES, SPEECH_MIME_TYPE } from "./constants.js";
import type { ConversationController, ConversationSink, Session } from "./conversation.js";
import { ERR } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { listPersonas, toPersonaOption } from "./personas.js";
import {
  ClientMessageSchema,
  type ClientMessage,
  type PersonaId,
  type ServerMessage,
  type Turn,
} from "./types.js";

/** The part of a ws WebSocket the connection writes to. */
export interface ClientSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string | Buffer): void;
}

export interface ConnectionOptions {
  personaId: PersonaId;
  voiceEnabled: boolean;
}

export class ChatConnection {
  private id: string;
  private socket: ClientSocket;
  private controller: ConversationController;
  private options: ConnectionOptions;
  private log: Logger;
  private session: Session | null = null;
  private closed = false;

  /** Resolves when the current turn completes. Null when idle. */
  public turnPromise: Promise<void> | null = null;

  constructor(
    id: string,
    socket: ClientSocket,
    controller: ConversationController,
    options: ConnectionOptions
  ) {
    this.id = id;
    this.socket = socket;
    this.controller = controller;
    this.options = options;
    this.log = createLogger("connection", { session: id.slice(0, 8) });
  }

  // ── Send helpers (safe for closed WS) ─────────────────────────────

  private trySendJson(message: ServerMessage): void {
    try {
      if (this.socket.readyState === this.socket.OPEN) {
        this.socket.send(JSON.stringify(message));
      }
    } catch (err) {
      this.log.warn({ err }, "trySendJson failed");
    }
  }

  private trySendBytes(data: Buffer): void {
    try {
      if (this.socket.readyState === this.socket.OPEN) {
        this.socket.send(data);
      }
    } catch (err) {
      this.log.warn({ err }, "trySendBytes failed");
    }
  }

  private sink(): ConversationSink {
    return {
      onStateChange: (state) => this.trySendJson({ type: MSG.STATE, state }),
      onTurn: (turn) => this.trySendJson({ type: MSG.TURN, turn }),
      onReset: (personaId, turns) => this.sendTranscript(personaId, turns),
      onChunk: (text, accumulated) => this.trySendJson({ type: MSG.CHUNK, text, accumulated }),
      onAudio: (audio, text) => {
        this.trySendJson({ type: MSG.SPEECH, mimeType: SPEECH_MIME_TYPE, text });
        this.trySendBytes(audio);
      },
      onNotice: (message) => this.trySendJson({ type: MSG.NOTICE, message }),
    };
  }

  private sendTranscript(personaId: PersonaId, turns: readonly Turn[]): void {
    this.trySendJson({ type: MSG.TRANSCRIPT, personaId, turns: [...turns] });
  }

  /**
   * Create the session, then send ready + the seeded transcript.
   */
  start(): void {
    const session = this.controller.startSession(this.id, this.options.personaId, this.sink(), {
      voiceEnabled: this.options.voiceEnabled,
    });
    this.session = session;

    this.trySendJson({
      type: MSG.READY,
      personas: listPersonas().map(toPersonaOption),
      personaId: session.activePersona,
      voiceAvailable: this.controller.voiceAvailable,
      voiceEnabled: session.voiceEnabled,
      sampleRate: SAMPLE_RATES.STT,
    });
    this.sendTranscript(session.activePersona, session.transcript.all());
  }

  /**
   * Handle a JSON text frame from the browser.
   */
  onMessage(raw: string): void {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      this.log.warn("Unparseable JSON from client");
      this.trySendJson({ type: MSG.ERROR, message: ERR.INVALID_MESSAGE });
      return;
    }

    const parsed = ClientMessageSchema.safeParse(data);
    if (!parsed.success) {
      this.log.warn({ error: parsed.error.message }, "Invalid client message");
      this.trySendJson({ type: MSG.ERROR, message: ERR.INVALID_MESSAGE });
      return;
    }
    this.dispatch(parsed.data);
  }

  /**
   * Handle a binary frame: one recorded utterance.
   */
  onAudio(data: Buffer): void {
    const session = this.session;
    if (!session || this.closed) return;
    this.track(this.controller.submitAudio(session, data));
  }

  /**
   * Wait for in-flight work, then drop the session.
   */
  async stop(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.turnPromise) await this.turnPromise;
    if (this.session?.speech) await this.session.speech;
    this.log.info("Session ended");
    this.session = null;
  }

  // ── Private methods ────────────────────────────────────────────────

  private dispatch(message: ClientMessage): void {
    if (message.type === MSG.PING) {
      this.trySendJson({ type: MSG.PONG });
      return;
    }

    const session = this.session;
    if (!session || this.closed) return;

    switch (message.type) {
      case MSG.SELECT_PERSONA:
        this.controller.switchPersona(session, message.personaId);
        break;
      case MSG.SET_VOICE: {
        const enabled = this.controller.setVoiceEnabled(session, message.enabled);
        this.trySendJson({ type: MSG.VOICE, enabled });
        break;
      }
      case MSG.USER_TEXT:
        this.track(this.controller.submitUserTurn(session, message.text));
        break;
    }
  }

  private track(turn: Promise<Turn | null>): void {
    const done: Promise<void> = turn
      .then(() => undefined)
      .catch((err: unknown) => {
        this.log.error({ err }, "Turn failed");
        this.trySendJson({ type: MSG.ERROR, message: ERR.TURN_FAILED });
      })
      .finally(() => {
        if (this.turnPromise === done) this.turnPromise = null;
      });
    this.turnPromise = done;
  }
}
