import { extractVideoId, isPlayableLocator, toWatchUrl } from '../src/utils/UrlValidator';

const ID = 'AbCdEfGhIj0';

describe('UrlValidator', () => {
  describe('extractVideoId', () => {
    it('should read watch, music, short and embed URLs', () => {
      expect(extractVideoId(`https://www.youtube.com/watch?v=${ID}`)).toBe(ID);
      expect(extractVideoId(`https://music.youtube.com/watch?v=${ID}&list=PL1`)).toBe(ID);
      expect(extractVideoId(`https://youtu.be/${ID}?t=30`)).toBe(ID);
      expect(extractVideoId(`https://www.youtube.com/shorts/${ID}`)).toBe(ID);
      expect(extractVideoId(`https://www.youtube.com/embed/${ID}`)).toBe(ID);
    });

    it('should accept a bare video id', () => {
      expect(extractVideoId(ID)).toBe(ID);
    });

    it('should reject other hosts, schemes and malformed ids', () => {
      expect(extractVideoId('https://open.spotify.com/track/123')).toBeNull();
      expect(extractVideoId('https://www.youtube.com/watch?v=short')).toBeNull();
      expect(extractVideoId(`ftp://youtube.com/watch?v=${ID}`)).toBeNull();
      expect(extractVideoId(`https://notyoutube.com/watch?v=${ID}`)).toBeNull();
      expect(extractVideoId('not a url')).toBeNull();
    });
  });

  describe('isPlayableLocator', () => {
    it('should be false for missing locators and page links', () => {
      expect(isPlayableLocator(undefined)).toBe(false);
      expect(isPlayableLocator('')).toBe(false);
      expect(isPlayableLocator('https://open.spotify.com/track/123')).toBe(false);
    });

    it('should be true for video URLs', () => {
      expect(isPlayableLocator(`https://youtu.be/${ID}`)).toBe(true);
    });
  });

  it('should build a canonical watch URL', () => {
    expect(toWatchUrl(ID)).toBe(`https://www.youtube.com/watch?v=${ID}`);
  });
});
