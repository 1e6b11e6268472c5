export {
    TOP,
    BOTTOM,
    variable,
    bound,
    join,
    meet,
    joinAll,
    meetAll,
    dual,
    freeVars,
    substitute,
    mapLattice,
} from './syntax.js';

export {
    strictEquality,
    lookup,
    assign,
    pure,
    bind,
    guess,
    orElse,
    andAlso,
    both,
    evalLattice,
    runEval,
} from './evaluator.js';

export type { Assignment, Branch, Eval } from './evaluator.js';

export { equivalent, preorder, satisfiable, distinctVars } from './predicates.js';

export { latticeToString } from './printer.js';
