/**
 * Localized texts posted to pairs
 * @module messages/catalog
 */

export const LANGUAGES = ['en', 'it'] as const

export type Language = (typeof LANGUAGES)[number]

/**
 * Texts for one language
 */
export interface MessageCatalog {
  /** Invitation posted to a new pair; mentions the channel the members come from */
  invitation(channelId: string): string
  /** Nudge posted to a pair that has not chatted since the invitation */
  reminder(): string
}

const catalogs: Record<Language, MessageCatalog> = {
  en: {
    invitation: (channelId) =>
      ':wave: hi <!here>, sometimes it can be difficult to know all your colleagues, ' +
      'so I take care of creating opportunities for a :coffee: and a chat among all ' +
      `members in <#${channelId}>.\nWhat do you think about a time to get to know each other better?`,
    reminder: () =>
      ':slightly_smiling_face: hi <!here>, have you had the chance to schedule a time ' +
      'for a :coffee: and a chat?',
  },
  it: {
    invitation: (channelId) =>
      ':wave: ciao <!here>, a volte può essere difficile conoscere tutti i colleghi, ' +
      'per questo mi occupo di creare occasioni per un :coffee: e due chiacchiere tra ' +
      `tutti i membri di <#${channelId}>.\nChe ne dite di trovare un momento per conoscervi meglio?`,
    reminder: () =>
      ':slightly_smiling_face: ciao <!here>, avete avuto modo di organizzare un momento ' +
      'per un :coffee: e due chiacchiere?',
  },
}

/**
 * Returns the texts for a language
 */
export function getMessages(language: Language): MessageCatalog {
  return catalogs[language]
}
