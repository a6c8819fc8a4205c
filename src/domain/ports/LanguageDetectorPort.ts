import type { DetectedLanguage } from '../entities/Document.js';

export interface LanguageDetectorPort {
  /** 回傳最可能的語言與信心值（0.0 ~ 1.0）；無法判斷時 confidence 為 0 */
  detect(text: string): DetectedLanguage;
}
