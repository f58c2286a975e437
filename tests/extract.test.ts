import assert from "node:assert/strict";
import test from "node:test";

import { extractText, isBoilerplate } from "../src/lib/archive/extract";
import { ExtractionError } from "../src/lib/errors";
import { DUTCH_PROCEDURAL_NOTES } from "../src/jobs/procedural_nl";

const page = (body: string) =>
  `<html><body><header>Site header</header><div id="website-body">${body}</div><footer>Footer</footer></body></html>`;

const options = { contentSelector: "#website-body", minTextLength: 0 };

const SITTING = page(`
  <nav><a href="#">Vorige</a></nav>
  <script>var tracking = true;</script>
  <style>.x { color: red; }</style>
  <h2>Woensdag 21 juli 1999</h2>
  <p>De   vergadering wordt
     geopend om 9 uur.</p>
  <p><span class="speaker">De Voorzitter.</span> Ik open de <b>vergadering</b>.</p>
  <table><tr><td>Eerste cel</td><td>Tweede cel</td></tr></table>
`);

test("extractText keeps one paragraph per block of the content container", () => {
  assert.equal(
    extractText(SITTING, { contentSelector: "#website-body" }),
    [
      "Woensdag 21 juli 1999",
      "De vergadering wordt geopend om 9 uur.",
      "De Voorzitter. Ik open de vergadering.",
      "Eerste cel",
      "Tweede cel",
    ].join("\n\n"),
  );
});

test("extractText is idempotent", () => {
  const first = extractText(SITTING, options);
  const second = extractText(SITTING, options);
  assert.equal(first, second);
});

test("extractText splits on line breaks and decodes non-breaking spaces", () => {
  assert.equal(
    extractText(page("<p>Artikel&nbsp;12&nbsp;&nbsp;lid 3<br>Tweede regel</p>"), options),
    "Artikel 12 lid 3\n\nTweede regel",
  );
});

test("extractText fails when the content container is missing", () => {
  assert.throws(
    () =>
      extractText("<html><body><p>Niets</p></body></html>", options, "https://example.test/doc"),
    (err) => {
      assert.ok(err instanceof ExtractionError);
      assert.equal(err.message, 'Content container "#website-body" not found');
      assert.equal(err.url, "https://example.test/doc");
      return true;
    },
  );
});

test("extractText fails when the remaining text is too short", () => {
  assert.throws(
    () => extractText(page("<p>Kort.</p>"), { contentSelector: "#website-body" }),
    (err) => {
      assert.ok(err instanceof ExtractionError);
      assert.equal(err.message, "Extracted text too short (5 < 50 chars)");
      return true;
    },
  );
});

test("extractText drops page numbers and separator lines", () => {
  assert.equal(
    extractText(
      page("<p>12</p><p>Eerste alinea.</p><p>- 13 -</p><p>* * *</p><p>3/40</p><p>Tweede alinea.</p>"),
      options,
    ),
    "Eerste alinea.\n\nTweede alinea.",
  );
});

test("extractText keeps content paragraphs that recur", () => {
  const resolutions = [1, 2, 3]
    .map((n) => `<p>Het Europees Parlement,</p><p>Resolutie ${n}.</p><p>(Applaus)</p>`)
    .join("");

  assert.equal(
    extractText(page(resolutions), options),
    [
      "Het Europees Parlement,", "Resolutie 1.", "(Applaus)",
      "Het Europees Parlement,", "Resolutie 2.", "(Applaus)",
      "Het Europees Parlement,", "Resolutie 3.", "(Applaus)",
    ].join("\n\n"),
  );
});

test("extractText removes configured selectors and procedural notes", () => {
  const html = page(`
    <div class="doc_box_header">PE 123.456</div>
    <p>Het debat wordt gesloten. (debat)</p>
    <p>Mevrouw Jansen heeft het woord. (zie bijlage 2)</p>
    <p>De Voorzitter. Dank u. (de Voorzitter stemt toe)</p>
    <p>Volgens het Reglement (artikel 12, lid 3) is dit ontvankelijk.</p>
    <p>De tekst staat online (https://www.europarl.europa.eu/doceo) voor iedereen.</p>
    <p>Het woord wordt gevoerd door de heer Bakker. Stemming: het verslag wordt aangenomen. De notulen worden goedgekeurd.</p>
    <p>Verslag Jansen [A5-0012/1999] [1999/0123(COD)]</p>
  `);

  assert.equal(
    extractText(html, {
      ...options,
      ignoreSelectors: [".doc_box_header"],
      stripPatterns: DUTCH_PROCEDURAL_NOTES,
    }),
    [
      "Mevrouw Jansen heeft het woord.",
      "De Voorzitter. Dank u.",
      "Volgens het Reglement is dit ontvankelijk.",
      "De tekst staat online voor iedereen.",
      "De notulen worden goedgekeurd.",
      "Verslag Jansen",
    ].join("\n\n"),
  );
});

test("isBoilerplate recognises layout artefacts only", () => {
  assert.equal(isBoilerplate("12"), true);
  assert.equal(isBoilerplate("— 7 —"), true);
  assert.equal(isBoilerplate("______"), true);
  assert.equal(isBoilerplate("Artikel 12"), false);
  assert.equal(isBoilerplate("Stemming"), false);
});
