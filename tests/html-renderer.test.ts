/**
 * Tests for the HTML Renderer
 */

import { describe, it, expect } from 'vitest';
import { HtmlRenderer, fillTemplate } from '../lib/tools/html-renderer';
import { variantUrl } from '../lib/tools/images/image-storage';
import { makeRecord } from './helpers';

const PAGE =
  '<html lang="{{lang}}"><title>{{pagetitle}}</title><img src="{{potraitcoverurl}}">' +
  '<a href="{{canurl}}"></a><div {{{coveraudioattr}}}></div><!--INSERT_SLIDES_HERE--></html>';
const PARTIAL = '<section id="{{slideid}}" {{{audioattr}}}><img src="{{image}}" alt="{{alt}}"><p>{{paragraph}}</p></section>';

const TEMPLATES: Record<string, string> = { news: PAGE, 'partials/slide': PARTIAL };

function renderer(): HtmlRenderer {
  return new HtmlRenderer({
    loader: async name => {
      const template = TEMPLATES[name];
      if (template === undefined) {
        throw new Error(`no template ${name}`);
      }
      return template;
    },
    cdnPrefix: 'https://cdn.example.com/',
    bucket: 'media-bucket',
    defaultCoverImage: 'https://cdn.example.com/cover.jpg',
    defaultSlideImage: 'https://cdn.example.com/slide.jpg',
  });
}

describe('fillTemplate', () => {
  it('should escape double braces and leave triple braces raw', () => {
    expect(fillTemplate('{{a}} {{{a}}} {{b}}', { a: '<i>' })).toBe('&lt;i&gt; <i> ');
  });
});

describe('HtmlRenderer', () => {
  it('should fill the page and insert slides with default images', async () => {
    const record = makeRecord();
    record.slide_deck.slides[0].text = 'Tom & Jerry <Live>';

    const html = await renderer().render(record, 'news');

    expect(html).toBe(
      '<html lang="en"><title>Tom &amp; Jerry &lt;Live&gt;</title><img src="https://cdn.example.com/cover.jpg">' +
        '<a href="https://stories.example.com/council-approves-budget_abc123DEF0_G"></a><div ></div>' +
        '<section id="slide-1" ><img src="https://cdn.example.com/slide.jpg" alt="Council chamber"><p>The vote was close.</p></section></html>'
    );
  });

  it('should use stored images and slide audio', async () => {
    const record = makeRecord({
      image_assets: [
        { source: 'ai', slide_index: 0, original_object_key: 'media/cover.png', resized_variants: {} },
        { source: 'ai', slide_index: 1, original_object_key: 'media/s1.png', resized_variants: {} },
      ],
      voice_assets: [
        { provider: 'openai_tts', audio_url: 'https://cdn.example.com/a0.mp3', duration_seconds: 3 },
        { provider: 'openai_tts', audio_url: 'https://cdn.example.com/a1.mp3', duration_seconds: 4 },
      ],
    });
    const portrait = { name: 'portrait', width: 720, height: 1280 };

    const html = await renderer().render(record, 'news');

    expect(html).toContain(`<img src="${variantUrl('https://cdn.example.com/', 'media-bucket', 'media/cover.png', portrait)}">`);
    expect(html).toContain(`<img src="${variantUrl('https://cdn.example.com/', 'media-bucket', 'media/s1.png', portrait)}"`);
    expect(html).toContain('<div background-audio="https://cdn.example.com/a0.mp3"></div>');
    expect(html).toContain('<section id="slide-1" background-audio="https://cdn.example.com/a1.mp3">');
  });

  it('should never load a template key that is a path', async () => {
    const requested: string[] = [];
    const tracking = new HtmlRenderer({
      loader: async name => {
        requested.push(name);
        return TEMPLATES[name] ?? '';
      },
    });

    await tracking.render(makeRecord(), '../../etc/passwd');

    expect(requested).toEqual(['news', 'partials/slide']);
  });

  it('should address images in their own bucket', async () => {
    const record = makeRecord({
      image_assets: [
        { source: 'custom', slide_index: 0, original_object_key: 'uploads/a.png', bucket: 'user-uploads', resized_variants: {} },
      ],
    });
    const portrait = { name: 'portrait', width: 720, height: 1280 };

    const html = await renderer().render(record, 'news');

    expect(html).toContain(`<img src="${variantUrl('https://cdn.example.com/', 'user-uploads', 'uploads/a.png', portrait)}">`);
  });

  it('should fall back to the mode template and keep dollar signs in slide text', async () => {
    const record = makeRecord();
    record.slide_deck.slides[1].text = 'Costs $& more';

    const html = await renderer().render(record, 'breaking-news');

    expect(html).toContain('<p>Costs $&amp; more</p>');
  });
});
