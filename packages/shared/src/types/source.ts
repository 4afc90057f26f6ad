export type CitationFragment = {
  title: string;
  uri: string;
  snippet?: string;
};

export type Source = {
  id: string;
  title: string;
  url: string;
  snippet?: string;
  favicon?: string;
};

export type AssembledResponse = {
  fullText: string;
  sources: Source[];
  followUpQuestions: string[];
};

export type SplitResponse = {
  mainText: string;
  followUpQuestions: string[];
};
