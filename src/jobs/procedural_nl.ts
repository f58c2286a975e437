// Procedural notes the Dutch minutes insert between speeches.
export const DUTCH_PROCEDURAL_NOTES: RegExp[] = [
  /\((?:debat|stemming|vraag|interventie)\)/gi,
  /\(Het woord wordt gevoerd door:.*?\)/gi,
  /(?:\(|\[)\s*(?:[a-z]{2,3}\s*)?(?:artikel|rule|punt|item)\s*\d+(?:,\s*lid\s*\d+)?(?:\s+\w+)?\s*(?:\)|\])/gi,
  /\[(?:COM|A)\d+-\d+(?:\/\d+)?\]/g,
  /\(?https?:\/\/\S+?\)/g,
  /\[\s*\d{4}\/\d{4}\((?:COD|INI|RSP|IMM|NLE)\)\]/g,
  /\[\s*\d{5}\/\d{4}\s*-\s*C\d+-\d+\/\d+\s*-\s*\d{4}\/\d{4}\(NLE\)\]/g,
  /\(“Stemmingsuitslagen”, punt \d+\)/g,
  /\(de Voorzitter(?: maakt na de toespraak van.*?| weigert in te gaan op.*?| stemt toe| herinnert eraan dat de gedragsregels moeten worden nageleefd| neemt er akte van|)\)/g,
  /\(zie bijlage.*?\)/gi,
  /\(\s*De vergadering wordt om.*?(?:geschorst|hervat)\.\)/g,
  /Volgens de “catch the eye”-procedure wordt het woord gevoerd door.*?\./g,
  /Het woord wordt gevoerd door .*?\./g,
  /De vergadering wordt om \d{1,2}\.\d{2} uur (?:gesloten|geopend)\./g,
  /Het debat wordt gesloten\./g,
  /Stemming:.*?\./g,
];
