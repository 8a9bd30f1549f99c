// logic-solver ships no type declarations; this covers the part the tests use.
declare module "logic-solver" {
	namespace Logic {
		interface Formula { }

		/// A variable name, negated by a leading "-", or a formula.
		type Operand = string | Formula;

		interface Solution {
			getTrueVars(): string[];
		}

		class Solver {
			require(...operands: Operand[]): void;
			solve(): Solution | null;
		}

		function or(...operands: Operand[]): Formula;
	}

	export = Logic;
}
