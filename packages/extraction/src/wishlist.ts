import { load } from "cheerio";

import { formatPrice } from "./price";
import { shortenName } from "./report";
import type { ParsedSpecs, ScoredListing } from "./types";

const WISHLIST_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title></title>
  <style>
    * { box-sizing: border-box; }
    body { font-family: "Segoe UI", Tahoma, Geneva, Verdana, sans-serif; background: #f4f5fb; color: #333; margin: 0; padding: 20px; }
    .container { background: #fff; max-width: 800px; margin: 0 auto; padding: 40px; border-radius: 15px; box-shadow: 0 10px 40px rgba(0, 0, 0, 0.15); }
    h1, .subtitle { text-align: center; }
    .subtitle { color: #666; margin-bottom: 30px; }
    .item { border: 1px solid #e0e0e0; border-radius: 10px; margin-bottom: 20px; padding: 25px; }
    .item h2 { margin-top: 0; font-size: 1.2em; }
    .specs { list-style: none; padding: 0; margin: 15px 0; }
    .specs li { margin-bottom: 8px; color: #555; }
    .price-tag { font-size: 1.4em; font-weight: bold; color: #2c3e50; }
    .savings { color: #28a745; font-weight: bold; margin-top: 5px; }
    .upgrade-notes { color: #666; font-size: 0.9em; font-style: italic; }
    .btn { display: inline-block; margin-top: 15px; padding: 12px 25px; background: #5a67d8; color: #fff; text-decoration: none; border-radius: 25px; font-weight: bold; }
    .footer { text-align: center; margin-top: 30px; padding-top: 20px; border-top: 1px solid #eee; color: #888; font-size: 0.85em; }
  </style>
</head>
<body>
  <div class="container">
    <h1></h1>
    <p class="subtitle"></p>
    <div class="items"></div>
    <div class="footer"></div>
  </div>
</body>
</html>`;

export type WishlistOptions = {
  topN?: number;
  title?: string;
};

export function renderWishlistHtml(deals: readonly ScoredListing[], options: WishlistOptions = {}): string {
  const title = options.title ?? "My Laptop Wishlist";
  const top = deals.slice(0, options.topN ?? 3);
  const $ = load(WISHLIST_TEMPLATE);

  $("title").text(title);
  $("h1").text(title);
  $(".subtitle").text(`Top ${top.length} upgrade options based on my analysis`);
  $(".footer").text(`Generated from ${deals.length} ranked listings`);

  const items = $(".items");
  top.forEach((deal, index) => {
    const item = $("<div></div>").addClass("item");
    item.append($("<h2></h2>").text(`${index + 1}. ${shortenName(deal.name, 60)}`));

    const specs = $("<ul></ul>").addClass("specs");
    for (const [label, value] of specEntries(deal.specs)) {
      const line = $("<li></li>");
      line.append($("<strong></strong>").text(`${label}:`));
      line.append($("<span></span>").text(` ${value}`));
      specs.append(line);
    }
    item.append(specs);

    item.append($("<div></div>").addClass("price-tag").text(formatPrice(deal.priceCents)));
    if (deal.savingCents !== null) {
      item.append($("<div></div>").addClass("savings").text(`Save ${formatPrice(deal.savingCents)}!`));
    }
    item.append($("<p></p>").addClass("upgrade-notes").text(`Upgrades: ${deal.notes || "Good value"}`));
    item.append(
      $("<a></a>")
        .addClass("btn")
        .attr({ href: deal.url, target: "_blank", rel: "noopener noreferrer" })
        .text("View Product"),
    );

    items.append(item);
  });

  return $.html();
}

function specEntries(specs: ParsedSpecs): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  if (specs.cpuGen !== null) {
    entries.push(["CPU", `${specs.cpuModel ?? "Unknown model"} (Gen ${specs.cpuGen})`]);
  }
  if (specs.ramGb !== null) {
    entries.push(["RAM", `${specs.ramGb}GB`]);
  }
  if (specs.storageGb !== null) {
    entries.push(["Storage", `${specs.storageGb}GB`]);
  }
  if (specs.gpu !== null) {
    entries.push(["GPU", specs.gpu]);
  }
  return entries;
}
