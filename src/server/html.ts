import type { CoinView } from '../types';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const STYLE = `
    h1 { border-bottom: 1px solid #ccc; padding-bottom: 0.25em; }
    h2 { display: flex; align-items: center; margin-bottom: 0.5em; }
    h2 img { width: 32px; height: 32px; margin-right: 0.35em; }
    .container { width: 800px; margin: 0 auto; }
    .row { margin: 1.5em 0; }
    .address { margin: 0.75em 0; }`;

function renderCoin(coin: CoinView): string {
  const icon = coin.iconUrl
    ? `<img src="${escapeHtml(coin.iconUrl)}" alt="${escapeHtml(coin.name)}">`
    : '';
  const addresses = coin.addresses.map((a) => {
    const address = a.linkUrl
      ? `<a href="${escapeHtml(a.linkUrl)}">${escapeHtml(a.address)}</a>`
      : escapeHtml(a.address);
    return `
      <div class="address">
        Address: ${address}<br>
        Balance: ${escapeHtml(a.balance)}<br>
        Last Active On: ${escapeHtml(a.lastActive)}<br>
        Time Since Last Activity: ${escapeHtml(a.elapsed)}
      </div>`;
  }).join('');

  return `
    <div class="row">
      <h2>${icon}${escapeHtml(coin.name)}</h2>${addresses}
    </div>`;
}

export function renderStatusPage(coins: CoinView[]): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Crypto Wallet Watcher</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
    <h1>Wallet Status</h1>${coins.map(renderCoin).join('')}
  </div>
</body>
</html>
`;
}
