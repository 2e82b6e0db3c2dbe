/** Monotonic ID source for one node kind. IDs start at 1 and are never handed out twice. */
export class IdAllocator {
  private nextId = 1;

  next(): number {
    return this.nextId++;
  }

  /** Records an externally assigned ID so later `next()` calls stay above it. */
  observe(id: number): void {
    if (id >= this.nextId) this.nextId = id + 1;
  }

  peek(): number {
    return this.nextId;
  }
}

export type IirNodeKind = 'stencil' | 'multiStage' | 'stage' | 'doMethod';

/** One allocator per internal-IR node kind, owned by a single instantiation. */
export class IirIdAllocators {
  private readonly allocators: Record<IirNodeKind, IdAllocator> = {
    stencil: new IdAllocator(),
    multiStage: new IdAllocator(),
    stage: new IdAllocator(),
    doMethod: new IdAllocator(),
  };

  next(kind: IirNodeKind): number {
    return this.allocators[kind].next();
  }

  observe(kind: IirNodeKind, id: number): void {
    this.allocators[kind].observe(id);
  }
}
