import createDebug from "debug";
import { List } from "immutable";

const debug = createDebug("tessera:dataset");

type DatasetLike<T> =
  | AsyncIterable<T>
  | Iterable<T>
  // generators
  | (() => AsyncIterator<T, void>)
  | (() => Iterator<T, void>);

/** Immutable series of data */
export class Dataset<T> implements AsyncIterable<T> {
  readonly #content: () => AsyncIterator<T, void, undefined>;

  /** Wrap given data generator
   *
   * To avoid loading everything in memory, it is a function that upon calling
   * should return a new AsyncGenerator with the same data as before.
   */
  constructor(content: DatasetLike<T>) {
    this.#content = async function* () {
      let iter: AsyncIterator<T, void> | Iterator<T, void>;
      if (typeof content === "function") iter = content();
      else if (Symbol.asyncIterator in content)
        iter = content[Symbol.asyncIterator]();
      else iter = content[Symbol.iterator]();

      while (true) {
        const result = await iter.next();
        if (result.done === true) break;
        yield result.value;
      }
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.#content();
  }

  /** Apply function to each element
   *
   * @param mapper how to change each element
   */
  map<U>(mapper: (_: T) => U | Promise<U>): Dataset<U> {
    return new Dataset(
      async function* (this: Dataset<T>) {
        for await (const e of this) yield await mapper(e);
      }.bind(this),
    );
  }

  /** Gather every element in memory */
  async toList(): Promise<List<T>> {
    let ret = List<T>();
    for await (const e of this) ret = ret.push(e);
    return ret;
  }

  /** Try to keep generated elements to avoid recomputing
   *
   * Drops everything when memory pressure is applied.
   */
  cached(): Dataset<T> {
    return new CachingDataset(this.#content);
  }
}

/**
 * Avoid recomputing the parent dataset, without hogging memory
 *
 * As reading and parsing records can be time-consuming, this keeps a weak
 * reference to the generated elements so that a second iteration might yield
 * theses directly.
 **/
class CachingDataset<T> extends Dataset<T> {
  // potential reference to all elements
  // tristate: undefined == empty, [false, _] == filling, [true, _] == filled
  #cache = new WeakRef<[filled: boolean, List<T>]>([false, List()]);

  override [Symbol.asyncIterator](): AsyncIterator<T> {
    const cached = this.#cache.deref();

    if (cached !== undefined && cached[0]) {
      debug("valid cache, reading from it");

      return (async function* () {
        yield* cached[1];
      })();
    }

    debug("cache invalid, reading from dataset");

    this.#cache = new WeakRef([false, List()]);

    const parentContent = {
      [Symbol.asyncIterator]: () => super[Symbol.asyncIterator](),
    };
    return async function* (this: CachingDataset<T>) {
      for await (const e of parentContent) {
        yield e;

        const caching = this.#cache.deref();
        if (caching !== undefined) caching[1] = caching[1].push(e);
      }

      const caching = this.#cache.deref();
      if (caching === undefined) {
        debug("cache evicted while filling");
        return;
      }

      debug("cache filled");
      caching[0] = true;
    }.bind(this)();
  }
}
