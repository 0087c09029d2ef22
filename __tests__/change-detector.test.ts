/**
 * 갱신 마커 감지 테스트
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { ChangeDetector, readMarker } from '../lib/change-detector.js';
import { MarkerNotFoundError } from '../lib/errors.js';

const page = (marker: string) => cheerio.load(`
  <html><body>
    <div class="content-inner">
      <h1>Coronavirus Cases:</h1>
      <div style="font-size:13px">Last updated: ${marker}</div>
    </div>
  </body></html>
`);

describe('readMarker', () => {
  it('should return the text after the first colon, trimmed', () => {
    expect(readMarker(page('March 1, 2020, 09:00 GMT'))).toBe('March 1, 2020, 09:00 GMT');
  });

  it('should use the innermost labelled element', () => {
    const $ = cheerio.load('<div><p>Intro</p><div><span>Last updated</span>:  April 2, 2020 </div></div>');

    expect(readMarker($)).toBe('April 2, 2020');
  });

  it('should take the first of several labelled elements', () => {
    const $ = cheerio.load(`
      <body>
        <div>Last updated: March 1, 2020, 09:00 GMT</div>
        <footer><p>Last updated: page template v2</p></footer>
      </body>
    `);

    expect(readMarker($)).toBe('March 1, 2020, 09:00 GMT');
  });

  it('should ignore script contents', () => {
    const $ = cheerio.load('<body><script>var s = "Last updated: fake";</script><p>Last updated: real</p></body>');

    expect(readMarker($)).toBe('real');
  });

  it('should throw MarkerNotFoundError when the label is missing', () => {
    const $ = cheerio.load('<body><p>Nothing here</p></body>');

    expect(() => readMarker($)).toThrow(MarkerNotFoundError);
  });

  it('should throw MarkerNotFoundError when the value is empty', () => {
    const $ = cheerio.load('<body><p>Last updated:   </p></body>');

    try {
      readMarker($);
      expect.fail('Should have thrown MarkerNotFoundError');
    } catch (error) {
      expect(error).toBeInstanceOf(MarkerNotFoundError);
      if (error instanceof MarkerNotFoundError) {
        expect(error.code).toBe('MARKER_NOT_FOUND');
      }
    }
  });
});

describe('ChangeDetector', () => {
  it('should start without a previous marker', () => {
    expect(new ChangeDetector().lastMarker).toBeNull();
  });

  it('should report new content and remember the marker', () => {
    const detector = new ChangeDetector();

    expect(detector.detect(page('A'))).toEqual({ changed: true, marker: 'A', previous: null });
    expect(detector.lastMarker).toBe('A');
  });

  it('should report no change for an identical marker', () => {
    const detector = new ChangeDetector();
    detector.detect(page('A'));

    expect(detector.detect(page('A'))).toEqual({ changed: false, marker: 'A' });
  });

  it('should compare markers case-sensitively', () => {
    const detector = new ChangeDetector();
    detector.detect(page('March 1'));

    expect(detector.detect(page('march 1'))).toEqual({ changed: true, marker: 'march 1', previous: 'March 1' });
  });

  it('should keep the previous marker when the marker cannot be found', () => {
    const detector = new ChangeDetector();
    detector.detect(page('A'));

    expect(() => detector.detect(cheerio.load('<p>layout changed</p>'))).toThrow(MarkerNotFoundError);
    expect(detector.lastMarker).toBe('A');
  });

  it('should not change state on peek', () => {
    const detector = new ChangeDetector();

    expect(detector.peek(page('B'))).toBe('B');
    expect(detector.lastMarker).toBeNull();
  });
});
