export interface Chapter {
  index: number;
  title: string;
  body: string;
}

export interface ConversionConfig {
  placeholderDir: string;
  frontImageDir: string;
  placeholderPattern: RegExp;
  chapterPattern: RegExp;
  coverExtensions: string[];
  prefaceTitle: string;
  language: string;
  author?: string;
}

export interface ConversionResources {
  sourcePath: string;
  /** Other .txt files that were passed over, in sorted order */
  ignoredSources: string[];
  coverPath: string;
  placeholderImages: string[];
  frontImages: string[];
}

export interface Substitution {
  marker: string;
  image: string;
}

export interface SubstitutionResult {
  text: string;
  substitutions: Substitution[];
  remainingMarkers: number;
}

export interface ConversionResult {
  outputPath: string;
  chapters: string[];
  substitutions: number;
  remainingMarkers: number;
}
