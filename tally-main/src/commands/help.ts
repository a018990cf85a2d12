export const HELP_TEXT = [
  "Commands:",
  "  help             Show this help",
  "  history          Show recent results",
  "  clear            Clear the history",
  "  mode [deg|rad]   Show or set the trig angle mode",
  "  precision [N]    Show or set decimal places for printing (0-20)",
  "  m+ [x]           Add x (or ans if omitted) to memory",
  "  m- [x]           Subtract x (or ans if omitted) from memory",
  "  ms [x]           Store x (or ans if omitted) in memory",
  "  mr               Print memory value",
  "  mc               Clear memory (set to 0)",
  "  reset            Reset ans, mem, mode, precision and history",
  "  quit / exit      Leave the calculator",
  "",
  "Expressions:",
  "  Operators   + - * / // % ** ^ and postfix !, with parentheses",
  "  Functions   sin cos tan asin acos atan exp log ln log10 sqrt",
  "              floor ceil round abs factorial (one argument each)",
  "  Constants   pi e tau inf nan",
  "  Variables   ans (last answer), mem (memory register)",
  "  Examples    2*(3+4)^2 / 7    5!    sqrt(16) + log10(100)    ans*2",
].join("\n");
