// conversation.ts - Session state and the conversation controller.
//
// One Session per connected user. The controller owns no per-user state: every
// operation takes the Session it acts on. Turns flow
//   user text → transcript → projected history → streamed reply → transcript
// with at most one reply in flight per session.

import { describeError, ERR, ERR_INTERNAL } from "./errors.js";
import { projectHistory } from "./history.js";
import type { LlmClient } from "./llm.js";
import { createLogger, type Logger } from "./logger.js";
import { getPersona, switchAnnouncement } from "./personas.js";
import { TranscriptStore } from "./transcript.js";
import type { ConversationState, PersonaId, Turn } from "./types.js";
import type { VoiceBridge } from "./voice.js";

/** Receives everything the UI needs to render a session. All callbacks are optional. */
export interface ConversationSink {
  onStateChange?: (state: ConversationState) => void;
  /** A turn was appended. */
  onTurn?: (turn: Turn) => void;
  /** The transcript was cleared and reseeded. */
  onReset?: (personaId: PersonaId, turns: readonly Turn[]) => void;
  /** A reply fragment arrived; `accumulated` is the reply so far. */
  onChunk?: (chunk: string, accumulated: string) => void;
  /** Synthesized speech for `text`. */
  onAudio?: (audio: Buffer, text: string) => void;
  /** Informational message that is not part of the transcript. */
  onNotice?: (message: string) => void;
}

export class Session {
  readonly id: string;
  readonly transcript = new TranscriptStore();
  readonly sink: ConversationSink;
  readonly log: Logger;
  activePersona: PersonaId;
  state: ConversationState = "idle";
  voiceEnabled = false;
  /** An utterance is being transcribed. The state stays idle meanwhile. */
  transcribing = false;

  /** Pending greeting/announcement playback. Null when nothing is playing. */
  speech: Promise<void> | null = null;

  constructor(id: string, personaId: PersonaId, sink: ConversationSink = {}) {
    this.id = id;
    this.activePersona = personaId;
    this.sink = sink;
    this.log = createLogger("conversation", { session: id.slice(0, 8) });
  }
}

export interface ControllerDeps {
  llm: LlmClient;
  /** Absent when speech credentials are not configured. */
  voice: VoiceBridge | null;
}

export interface StartOptions {
  voiceEnabled?: boolean;
}

function userTurn(content: string): Turn {
  return { role: "user", content, kind: "normal" };
}

function assistantTurn(content: string): Turn {
  return { role: "assistant", content, kind: "normal" };
}

function noticeTurn(content: string): Turn {
  return { role: "assistant", content, kind: "system_notice" };
}

export class ConversationController {
  private llm: LlmClient;
  private voice: VoiceBridge | null;

  constructor(deps: ControllerDeps) {
    this.llm = deps.llm;
    this.voice = deps.voice;
  }

  get voiceAvailable(): boolean {
    return this.voice !== null;
  }

  /**
   * Create a session seeded with the persona greeting.
   * The greeting is a notice: shown, but never part of the model history.
   */
  startSession(
    id: string,
    personaId: PersonaId,
    sink: ConversationSink = {},
    options: StartOptions = {}
  ): Session {
    const session = new Session(id, personaId, sink);
    session.voiceEnabled = Boolean(options.voiceEnabled) && this.voiceAvailable;

    const greeting = getPersona(personaId).greeting;
    session.transcript.reset(noticeTurn(greeting));
    session.log.info({ persona: personaId }, "Session started");
    this.speakInBackground(session, greeting);
    return session;
  }

  /**
   * Switch to another persona. Clears the transcript and reseeds it with a
   * switch announcement. Returns false when nothing changed.
   */
  switchPersona(session: Session, personaId: PersonaId): boolean {
    if (personaId === session.activePersona) return false;
    if (this.isBusy(session)) {
      session.log.warn({ persona: personaId }, "Persona switch ignored while awaiting a reply");
      session.sink.onNotice?.(ERR.BUSY);
      return false;
    }

    const persona = getPersona(personaId);
    const announcement = switchAnnouncement(persona);
    session.activePersona = personaId;
    session.transcript.reset(noticeTurn(announcement));
    session.log.info({ persona: personaId }, "Switched persona");
    session.sink.onReset?.(personaId, session.transcript.all());

    this.speakInBackground(session, announcement);
    return true;
  }

  /** Returns the resulting voice state. */
  setVoiceEnabled(session: Session, enabled: boolean): boolean {
    if (enabled && !this.voiceAvailable) {
      session.sink.onNotice?.(ERR.VOICE_UNAVAILABLE);
      session.voiceEnabled = false;
      return false;
    }
    session.voiceEnabled = enabled;
    return enabled;
  }

  /**
   * Submit a typed (or transcribed) user turn and stream the reply.
   * Resolves with the appended assistant turn, or null when nothing was submitted.
   */
  async submitUserTurn(session: Session, text: string): Promise<Turn | null> {
    if (!text.trim()) return null;
    if (this.isBusy(session)) {
      session.log.warn("Turn ignored while awaiting a reply");
      session.sink.onNotice?.(ERR.BUSY);
      return null;
    }

    const turn = userTurn(text);
    session.transcript.append(turn);
    session.sink.onTurn?.(turn);
    this.setState(session, "awaiting_response");

    // History is everything before the turn being sent
    const history = projectHistory(session.transcript.all().slice(0, -1));
    const persona = getPersona(session.activePersona);

    let reply: Turn;
    let succeeded = false;
    try {
      const chat = this.llm.startChat(history, persona.systemInstruction);
      let accumulated = "";
      for await (const chunk of chat.send(text)) {
        accumulated += chunk;
        session.sink.onChunk?.(chunk, accumulated);
      }
      reply = assistantTurn(accumulated);
      succeeded = true;
    } catch (err) {
      session.log.error({ err }, "Model request failed");
      reply = assistantTurn(ERR_INTERNAL.modelRequestFailed(describeError(err)));
    }

    session.transcript.append(reply);
    session.sink.onTurn?.(reply);
    this.setState(session, "idle");

    if (succeeded && reply.content) {
      await this.speak(session, reply.content);
    }
    return reply;
  }

  /**
   * Transcribe an utterance and submit it as a user turn.
   * Nothing is submitted when the transcription comes back empty.
   */
  async submitAudio(session: Session, audio: Buffer): Promise<Turn | null> {
    if (!this.voice) {
      session.sink.onNotice?.(ERR.VOICE_UNAVAILABLE);
      return null;
    }
    if (this.isBusy(session)) {
      session.log.warn("Audio ignored while awaiting a reply");
      session.sink.onNotice?.(ERR.BUSY);
      return null;
    }

    let text: string;
    session.transcribing = true;
    try {
      text = await this.voice.transcribe(audio);
    } finally {
      session.transcribing = false;
    }
    if (!text.trim()) {
      session.sink.onNotice?.(ERR.TRANSCRIPTION_EMPTY);
      return null;
    }
    return this.submitUserTurn(session, text);
  }

  private isBusy(session: Session): boolean {
    return session.state !== "idle" || session.transcribing;
  }

  private setState(session: Session, state: ConversationState): void {
    session.state = state;
    session.sink.onStateChange?.(state);
  }

  /** Synthesize and deliver speech. Never rejects. */
  private async speak(session: Session, text: string): Promise<void> {
    if (!session.voiceEnabled || !this.voice) return;
    try {
      const audio = await this.voice.synthesize(text);
      if (audio) session.sink.onAudio?.(audio, text);
    } catch (err) {
      session.log.warn({ err }, "Speech playback failed");
    }
  }

  private speakInBackground(session: Session, text: string): void {
    if (!session.voiceEnabled || !this.voice) return;
    const playback: Promise<void> = this.speak(session, text).finally(() => {
      if (session.speech === playback) session.speech = null;
    });
    session.speech = playback;
  }
}
