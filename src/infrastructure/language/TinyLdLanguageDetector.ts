import { detectAll } from 'tinyld';
import type { LanguageDetectorPort } from '../../domain/ports/LanguageDetectorPort.js';
import type { DetectedLanguage } from '../../domain/entities/Document.js';
import { UNKNOWN_LANGUAGE } from '../../domain/entities/Document.js';

/** 只取前段文字偵測，長文件不必全文掃描 */
const SAMPLE_CHARS = 20000;

/**
 * tinyld 語言偵測，回傳 ISO 639-1 代碼
 */
export class TinyLdLanguageDetector implements LanguageDetectorPort {
  detect(text: string): DetectedLanguage {
    const sample = text.slice(0, SAMPLE_CHARS).trim();
    if (!sample) return { code: UNKNOWN_LANGUAGE, confidence: 0 };

    const [top] = detectAll(sample);
    if (!top) return { code: UNKNOWN_LANGUAGE, confidence: 0 };
    return { code: top.lang, confidence: top.accuracy };
  }
}
