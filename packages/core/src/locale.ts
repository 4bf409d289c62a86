export type Language = 'en' | 'ru';

export type Localization = {
  startedStreaming: string;
  isLive: string;
  streamEnded: string;
  buttonText: string;
  viewers: string;
  avg: string;
  peak: string;
  clips: string;
  growing: string;
  steady: string;
  dropping: string;
  hours: string;
  minutes: string;
};

const locales: Record<Language, Localization> = {
  en: {
    startedStreaming: 'LIVE',
    isLive: 'LIVE',
    streamEnded: 'OFFLINE',
    buttonText: 'Watch',
    viewers: 'viewers',
    avg: 'avg',
    peak: 'peak',
    clips: 'clips',
    growing: 'growing',
    steady: 'steady',
    dropping: 'dropping',
    hours: 'h',
    minutes: 'm'
  },
  ru: {
    startedStreaming: 'LIVE',
    isLive: 'LIVE',
    streamEnded: 'OFFLINE',
    buttonText: 'Смотреть',
    viewers: 'зрителей',
    avg: 'среднее',
    peak: 'пик',
    clips: 'клипов',
    growing: 'растёт',
    steady: 'стабильно',
    dropping: 'падает',
    hours: 'ч',
    minutes: 'мин'
  }
};

export function getLocalization(language: Language): Localization {
  return locales[language];
}
