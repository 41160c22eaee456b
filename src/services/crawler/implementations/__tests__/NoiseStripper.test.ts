import { NoiseStripper } from '../NoiseStripper';
import { HtmlUtils } from '../../utils/HtmlUtils';

describe('NoiseStripper', () => {
  const stripper = new NoiseStripper();

  it('should remove landmark elements', () => {
    const document = HtmlUtils.parse(`
      <html><body>
        <header>Header text</header>
        <nav>Nav text</nav>
        <p>Body text</p>
        <aside>Aside text</aside>
        <footer>Footer text</footer>
      </body></html>
    `);

    expect(stripper.strip(document).textNodes()).toEqual(['Body text']);
  });

  it('should remove elements by class keyword regardless of case', () => {
    const document = HtmlUtils.parse(`
      <html><body>
        <div class="Site-Footer">Visitors: 100</div>
        <div class="page BreadCrumb-trail">Home &gt; News</div>
        <div class="article">Article text</div>
        <span class="visit-counter">12345</span>
      </body></html>
    `);

    expect(stripper.strip(document).textNodes()).toEqual(['Article text']);
  });

  it('should leave the original document untouched', () => {
    const document = HtmlUtils.parse('<html><body><footer>Footer</footer><p>Text</p></body></html>');

    stripper.strip(document);

    expect(document.textNodes()).toEqual(['Footer', 'Text']);
  });

  it('should accept a custom vocabulary', () => {
    const custom = new NoiseStripper(['section'], ['promo']);
    const document = HtmlUtils.parse(`
      <html><body>
        <section>Section</section>
        <div class="promo-box">Promo</div>
        <footer>Footer</footer>
      </body></html>
    `);

    expect(custom.strip(document).textNodes()).toEqual(['Footer']);
  });
});
