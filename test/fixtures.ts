/** Shared bracketings used across the test files. */

export const FIXTURE_TREE =
  '( (S (S-TPC-1 (NP-SBJ (PRP xx) ) (ADVP (RB xx) ) (VP (VBZ xx) (NP-PRD (DT xx) (NN xx) (NN xx) ))) '
  + '(, ,) (NP-SBJ (NNS xx) ) (VP (VBP xx) (SBAR (-NONE- 0) (S (-NONE- *T*-1) ))) (. .) ))';

export const FIXTURE_SIMPLIFIED =
  '(ROOT (S (S (NP (PRP xx) ) (ADVP (RB xx) ) (VP (VBZ xx) (NP (DT xx) (NN xx) (NN xx) ))) '
  + '(, ,) (NP (NNS xx)) (VP (VBP xx)) (. .) ))';

export const FIXTURE_STRING =
  '(S (S-TPC-1 (NP-SBJ (PRP xx)) (ADVP (RB xx)) (VP (VBZ xx) (NP-PRD (DT xx) (NN xx) (NN xx)))) '
  + '(, ,) (NP-SBJ (NNS xx)) (VP (VBP xx) (SBAR (-NONE- 0) (S (-NONE- *T*-1)))) (. .))';

export const SAID_TREE =
  '( (S (NP-SBJ-1 (NNP John)) (VP (VBD said) (SBAR (-NONE- 0) (S (NP-SBJ (PRP it)) (VP (VBD rained))))) (. .)) )';
