import type { Character } from '../types/character';
import type { TranscriptMessage } from '../types/conversation';
import type { Scenario } from '../types/scenario';
import type { ChatMessage } from '../shared/generation-state';
import { focusedPersona, persona } from './roster';

/**
 * Prompt builders for every generation step.
 *
 * Dialogue prompts come with a transcript already turned into the speaking
 * model's perspective: its own lines are 'assistant', the other party's 'user'.
 */

export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

export interface DialoguePrompt {
  systemPrompt: string;
  messages: ChatMessage[];
}

// ============================================
// Case creation
// ============================================

export function charactersPrompt(environment: string, rosterSize: number, caseNumber: number): PromptPair {
  const systemPrompt = `You are a character designer for a murder mystery game. Build a cast that belongs in the setting and gives the detective people worth interviewing.

Setting: ${environment} (case #${caseNumber})
Cast size: exactly ${rosterSize} characters

First, briefly reason about the setting, who would plausibly be there, what ties them together and who had reason to kill. Then provide the JSON.

Your response must end with valid JSON matching this schema:
{
  "characters": [
    {
      "role": "Killer" | "Victim" | "Suspect",
      "name": string,       // full name, unique in the cast
      "backstory": string   // background, concerns, motives, secrets (one or two paragraphs)
    }
  ]
}

Rules:
- Exactly one character has role "Killer" and exactly one has role "Victim"; everyone else is "Suspect".
- Roles must fit the setting (passengers on a train, staff at a hotel, traders at a market).
- Give every suspect something to hide so that no one looks innocent at first glance.`;

  return { systemPrompt, userPrompt: 'Generate the cast of characters.' };
}

export function scenarioPrompt(environment: string, roster: readonly Character[]): PromptPair {
  const systemPrompt = `You are writing the crime at the heart of a murder mystery game. Use the setting and the cast below.

Setting: ${environment}

Cast:
${roster.map(persona).join('\n')}

Describe where and when the body was found, how the victim died and with what, the state of the scene, who saw what, and the clues available from the start. Mix true clues with red herrings. The mystery must be solvable from the interviews.

Never reveal or hint at who the killer is, including in the character brief.

Your response must end with valid JSON matching this schema:
{
  "victimName": string,         // the Victim's name exactly as in the cast
  "timeOfDeath": string,
  "locationFound": string,
  "murderWeapon": string,
  "causeOfDeath": string,
  "crimeSceneDetails": string,
  "witnesses": string,
  "initialClues": string,
  "characterBrief": string      // every character and how they relate to one another
}`;

  return { systemPrompt, userPrompt: 'Generate the murder scenario.' };
}

// ============================================
// Narration
// ============================================

export function narrationPrompt(scenario: Scenario): DialoguePrompt {
  const systemPrompt = `You are the detective's trusted companion, meeting them as they arrive at a crime scene. In 100 words or fewer, brief them on what happened, speaking to them directly and conversationally.

Victim: ${scenario.victimName}
Time: ${scenario.timeOfDeath}
Location: ${scenario.locationFound}
Weapon: ${scenario.murderWeapon}
Cause of death: ${scenario.causeOfDeath}

Scene:
${scenario.crimeSceneDetails}`;

  return {
    systemPrompt,
    messages: [{ role: 'user', content: 'Describe the crime scene as I arrive.' }],
  };
}

// ============================================
// Interviews
// ============================================

export function introductionPrompt(character: Character, scenario: Scenario): DialoguePrompt {
  const systemPrompt = `You are playing a character in a murder mystery:
${persona(character)}
The detective is about to interview you about the death of ${scenario.victimName}, around ${scenario.timeOfDeath}, at ${scenario.locationFound}.

Greet the detective and introduce yourself in a few sentences, in your own voice. Do not reveal your role and do not incriminate yourself.`;

  return {
    systemPrompt,
    messages: [{ role: 'user', content: 'Introduce yourself to the detective.' }],
  };
}

export function questionPrompt(character: Character, scenario: Scenario, log: readonly TranscriptMessage[]): DialoguePrompt {
  const systemPrompt = `You are the detective, interviewing ${character.name} about the murder of ${scenario.victimName}.

The murder happened around ${scenario.timeOfDeath} at ${scenario.locationFound}. Weapon: ${scenario.murderWeapon}. Cause of death: ${scenario.causeOfDeath}.
Scene: ${scenario.crimeSceneDetails}
Initial clues: ${scenario.initialClues}

Conversation so far:
${formatTranscript(log)}

Ask ${character.name} one sharp, relevant question that moves the investigation forward. Put each sentence on its own line. Reply with the question only.`;

  return { systemPrompt, messages: detectivePerspective(log) };
}

export function answerPrompt(
  character: Character,
  relevantBackground: string,
  scenario: Scenario,
  log: readonly TranscriptMessage[],
  question: string,
): DialoguePrompt {
  const systemPrompt = `You are playing a character in a murder mystery:
${focusedPersona(character, relevantBackground)}
The detective is interviewing you about this crime:
  Victim: ${scenario.victimName}
  Time: ${scenario.timeOfDeath}
  Location: ${scenario.locationFound}
  Weapon: ${scenario.murderWeapon}
  Cause of death: ${scenario.causeOfDeath}
  Scene: ${scenario.crimeSceneDetails}

Everyone involved and how they relate:
${scenario.characterBrief}

Answer the detective's latest question as your character would: from your personality and background, with only what you would know, consistent with the story. You may lie if your character has a reason to.

Question: ${question}`;

  return { systemPrompt, messages: characterPerspective(log) };
}

// ── Helpers ──────────────────────────────────────────────────────────

function formatTranscript(log: readonly TranscriptMessage[]): string {
  if (log.length === 0) return '(nothing yet)';
  return log.map((m) => `${m.name ?? m.speaker}: ${m.text}`).join('\n');
}

/** The character model speaks as 'assistant'; the detective is 'user'. */
export function characterPerspective(log: readonly TranscriptMessage[]): ChatMessage[] {
  return log
    .filter((m) => m.speaker !== 'narrator')
    .map((m) => ({ role: m.speaker === 'character' ? 'assistant' : 'user', content: m.text }));
}

/** The detective model speaks as 'assistant'; the character is 'user'. */
export function detectivePerspective(log: readonly TranscriptMessage[]): ChatMessage[] {
  return log
    .filter((m) => m.speaker !== 'narrator')
    .map((m) => ({ role: m.speaker === 'detective' ? 'assistant' : 'user', content: m.text }));
}
