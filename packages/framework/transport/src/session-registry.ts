// Session Registry: peer identity -> inbound delivery handle
// Every operation is synchronous, so interleaved connects, disconnects
// and lookups never observe a half-applied change

export class SessionRegistry<H> {
  // Live handles per peer, oldest first
  private readonly sessions = new Map<string, H[]>();

  /** Register a handle; it becomes the one `lookup` returns. Returns the handle it displaces */
  register(peerDid: string, handle: H): H | undefined {
    const handles = this.sessions.get(peerDid);
    if (!handles) {
      this.sessions.set(peerDid, [handle]);
      return undefined;
    }
    const displaced = handles[handles.length - 1];
    handles.push(handle);
    return displaced;
  }

  /** Remove a specific handle; other connections of the same peer stay registered */
  unregister(peerDid: string, handle: H): boolean {
    const handles = this.sessions.get(peerDid);
    if (!handles) return false;
    const index = handles.lastIndexOf(handle);
    if (index < 0) return false;
    handles.splice(index, 1);
    if (handles.length === 0) this.sessions.delete(peerDid);
    return true;
  }

  /** Most recently registered handle still open for the peer */
  lookup(peerDid: string): H | undefined {
    const handles = this.sessions.get(peerDid);
    return handles?.[handles.length - 1];
  }

  has(peerDid: string): boolean {
    return this.sessions.has(peerDid);
  }

  /** Number of peers with at least one live handle */
  get size(): number {
    return this.sessions.size;
  }

  peers(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Every live handle, across peers */
  handles(): H[] {
    return Array.from(this.sessions.values()).flat();
  }
}
