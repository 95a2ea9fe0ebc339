// Generic questions a model falls back to when a chunk has little to say
export const BOILERPLATE_PATTERNS: readonly RegExp[] = [
  /^what is (this|the) (document|text|article|passage|section|chapter|paper|page) about\??$/i,
  /^what (does|do) (this|the) (document|text|article|passage|section|chapter|paper) (discuss|describe|cover|explain|say)\b/i,
  /^what (is|are) the (main|key|central) (topic|topics|point|points|idea|ideas|takeaway|takeaways|theme|themes)( of (this|the) (document|text|article|passage|section))?\??$/i,
  /^what is the (purpose|goal|summary) of (this|the) (document|text|article|passage|section|chapter|paper)\??$/i,
  /^(can|could) you (summari[sz]e|explain|describe) (this|the) (document|text|article|passage|section)\b/i,
  /^who (wrote|is the author of) (this|the) (document|text|article|paper)\??$/i,
  /^what (information|details) (does|do) (this|the) (document|text|article|passage|section) (provide|contain|give)\??$/i,
  /^what can (i|we|you|one) learn from (this|the) (document|text|article|passage|section)\??$/i,
  /^(is|are) there (any )?(more|other|additional|further) (information|details)\b/i,
];

// Words and phrases that signal an unsure answer
export const HEDGE_TERMS: readonly string[] = [
  'may',
  'might',
  'maybe',
  'perhaps',
  'possibly',
  'probably',
  'likely',
  'seems',
  'appears',
  'could be',
  'unclear',
  'uncertain',
  'not sure',
  'it depends',
  'not specified',
  'not mentioned',
];
