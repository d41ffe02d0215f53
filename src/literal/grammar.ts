/**
 * PEG grammar for grouped binary literals such as `100'10001010`.
 * Compiled by peggy at runtime. The parse result is the digit string
 * with group separators removed.
 */
export const BINARY_LITERAL_GRAMMAR = `
Literal
  = _ head:Group tail:("'" @Group)* _
    {
      return [head].concat(tail).join("");
    }

Group
  = $[01]+

_ "whitespace"
  = [ \\t\\r\\n]*
`;
