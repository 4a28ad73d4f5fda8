/**
 * Virtual register allocation.
 *
 * Registers are handed out as R1, R2, ... and never freed. One allocator
 * serves exactly one translation.
 */

export class RegisterAllocator {
  private next: number = 1;

  allocate(): string {
    const name = `R${this.next}`;
    this.next++;
    return name;
  }
}
