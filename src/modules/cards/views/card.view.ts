import { HtmlUtils } from '../../../common/utils/html.utils';
import { CardRecordDto } from '../dto/card-record.dto';

const CARD_STYLES = `
    .card { background: #fff; border-radius: 20px; box-shadow: 0 8px 24px rgba(0,0,0,0.08); padding: 28px 20px; text-align: center; }
    .card img.photo { width: 112px; height: 112px; border-radius: 50%; object-fit: cover; }
    .card img.logo { max-height: 48px; margin-top: 12px; }
    .card h1 { margin: 12px 0 4px; font-size: 24px; }
    .card .title { color: #55555f; margin: 0; }
    .card .org { color: #0066ff; margin: 4px 0 20px; font-weight: 600; }
    .actions { display: grid; gap: 10px; }
    .actions a, .actions button { display: block; padding: 14px; border-radius: 12px; background: #f0f2f8; text-decoration: none; font: inherit; border: 0; cursor: pointer; }
    .actions a.primary { background: #0066ff; color: #fff; }
    .qr { margin-top: 24px; }
    .qr img { width: 160px; height: 160px; }`;

function scriptValue(value: string): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export interface CardPageOptions {
  /** Path prefix for photos and logos served from STATIC_DIR */
  staticPrefix: string;
}

export function renderCardPage(
  card: CardRecordDto,
  options: CardPageOptions,
): string {
  const e = HtmlUtils.escape;
  const slug = encodeURIComponent(card.slug);

  const photo = card.photo
    ? `<img class="photo" src="${e(`${options.staticPrefix}/${card.photo}`)}" alt="${e(card.display_name)}">`
    : '';
  const logo = card.logo
    ? `<img class="logo" src="${e(`${options.staticPrefix}/${card.logo}`)}" alt="${e(card.org)}">`
    : '';
  const mapLink =
    card.address_display || card.maps_destination
      ? `<a href="/go/map/${slug}" target="_blank" rel="noopener">📍 ${e(card.address_display ?? 'Directions')}</a>`
      : '';

  const body = `<section class="card">
  ${photo}
  <h1>${e(card.display_name)}</h1>
  <p class="title">${e(card.title)}</p>
  <p class="org">${e(card.org)}</p>
  ${logo}
  <div class="actions">
    <a class="primary" href="/c/${slug}.vcf">Save contact</a>
    <a href="/go/whatsapp/${slug}" target="_blank" rel="noopener">WhatsApp ${e(card.whatsapp_display)}</a>
    <a href="tel:+${e(card.office_e164)}">Office ${e(card.office_display)}</a>
    <a href="/go/email/${slug}">${e(card.email)}</a>
    <a href="${e(card.website_url)}" target="_blank" rel="noopener">${e(card.website_display)}</a>
    ${mapLink}
    <button type="button" id="share">Share this card</button>
  </div>
  <div class="qr"><img src="/qr/${slug}.png" alt="QR code for this card"></div>
</section>
<script>
  document.getElementById('share').addEventListener('click', function () {
    fetch(${scriptValue(`/go/share/${slug}`)}, { keepalive: true });
    if (navigator.share) {
      navigator.share({ title: ${scriptValue(card.display_name)}, url: location.href });
    } else if (navigator.clipboard) {
      navigator.clipboard.writeText(location.href);
    }
  });
</script>`;

  return HtmlUtils.page(card.display_name, body, CARD_STYLES);
}
