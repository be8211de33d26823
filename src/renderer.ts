import type { QueryAST } from './queryAst';

/**
 * A renderer compiles a {@link QueryAST} into one backend's query form.
 *
 * Renderers are pure: they validate the AST, never mutate it, perform no I/O
 * and return the same output for the same input. New backends plug in by
 * implementing this interface; the builder and validator do not change.
 */
export interface Renderer<TOutput>
{
	/** Short backend name, e.g. `sql` or `mongo` */
	readonly name: string;

	/**
	 * @throws ValidationError if the AST breaks a structural invariant
	 * @throws RenderError if the AST uses something this backend cannot express
	 */
	render(ast: QueryAST): TOutput;
}
