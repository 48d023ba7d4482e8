export class TikTokService {
  // Canonical host, mobile host, and the vm./vt. short-link hosts
  private static readonly URL_PATTERN = /^https?:\/\/(www\.|m\.|vm\.|vt\.)?tiktok\.com\/\S+$/i;

  static validateTikTokUrl(url: string): boolean {
    const candidate = url.trim();
    return candidate.length > 0 && this.URL_PATTERN.test(candidate);
  }

  static isShortLink(url: string): boolean {
    return /^https?:\/\/(vm|vt)\.tiktok\.com\//i.test(url.trim());
  }

  static extractVideoId(url: string): string | null {
    const match = url.trim().match(/tiktok\.com\/@[^/]+\/video\/(\d+)/i);
    return match ? match[1] : null;
  }
}
