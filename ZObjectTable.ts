import {
  IllegalOperationError,
  InvalidAttributeError,
  InvalidObjectError,
  InvalidPropertyError,
} from "./errors";
import { ZMemory } from "./ZMemory";
import { decodeZString } from "./ZText";

// V3 object table layout
const PROPERTY_DEFAULTS_COUNT = 31;
const OBJECT_ENTRY_SIZE = 9;
const MAX_OBJECTS = 255;

const ATTRIBUTES_OFFSET = 0;
const PARENT_OFFSET = 4;
const SIBLING_OFFSET = 5;
const CHILD_OFFSET = 6;
const PROPERTIES_OFFSET = 7;

export interface PropertyEntry {
  number: number;
  length: number;
  dataAddress: number;
}

/**
 * Objects are addressed by number into a flat array of fixed-size entries;
 * parent/sibling/child are object numbers, never references.
 */
export class ZObjectTable {
  readonly count: number;

  constructor(
    private readonly memory: ZMemory,
    private readonly tableAddress: number,
    private readonly abbreviationsAddress: number,
  ) {
    this.count = this.inferObjectCount();
  }

  // The entries run up to the first property table in memory
  private inferObjectCount(): number {
    let lowestPropertyTable = Infinity;
    let count = 0;
    for (let id = 1; id <= MAX_OBJECTS; id++) {
      const addr = this.entryAddress(id);
      if (addr + OBJECT_ENTRY_SIZE > lowestPropertyTable) break;
      if (addr + OBJECT_ENTRY_SIZE > this.memory.size) break;
      const propertyTable = this.memory.readWord(addr + PROPERTIES_OFFSET);
      if (propertyTable === 0) break;
      lowestPropertyTable = Math.min(lowestPropertyTable, propertyTable);
      count = id;
    }
    return count;
  }

  private entryAddress(id: number): number {
    return this.tableAddress + PROPERTY_DEFAULTS_COUNT * 2 + (id - 1) * OBJECT_ENTRY_SIZE;
  }

  getObjectAddress(id: number): number {
    this.checkObject(id);
    return this.entryAddress(id);
  }

  private checkObject(id: number): void {
    if (!Number.isInteger(id) || id < 1 || id > this.count) {
      throw new InvalidObjectError(id, this.count);
    }
  }

  // --- Tree links ---

  getParent(id: number): number {
    return this.memory.readByte(this.getObjectAddress(id) + PARENT_OFFSET);
  }

  getSibling(id: number): number {
    return this.memory.readByte(this.getObjectAddress(id) + SIBLING_OFFSET);
  }

  getChild(id: number): number {
    return this.memory.readByte(this.getObjectAddress(id) + CHILD_OFFSET);
  }

  setParent(id: number, value: number): void {
    this.memory.writeByte(this.getObjectAddress(id) + PARENT_OFFSET, value);
  }

  setSibling(id: number, value: number): void {
    this.memory.writeByte(this.getObjectAddress(id) + SIBLING_OFFSET, value);
  }

  setChild(id: number, value: number): void {
    this.memory.writeByte(this.getObjectAddress(id) + CHILD_OFFSET, value);
  }

  /**
   * Unlinks an object from its parent's child list. The object keeps its own
   * children; its parent and sibling become 0.
   */
  removeObject(id: number): void {
    const parent = this.getParent(id);
    if (parent !== 0) {
      const first = this.getChild(parent);
      if (first === id) {
        this.setChild(parent, this.getSibling(id));
      } else {
        let current = first;
        let steps = 0;
        for (;;) {
          if (current === 0 || steps++ > this.count) {
            throw new IllegalOperationError(
              `Object ${id} is missing from the child list of its parent ${parent}`,
            );
          }
          const next = this.getSibling(current);
          if (next === id) {
            this.setSibling(current, this.getSibling(id));
            break;
          }
          current = next;
        }
      }
    }
    this.setParent(id, 0);
    this.setSibling(id, 0);
  }

  /**
   * Makes `id` the first child of `dest`. The removal completes before the
   * destination's child pointer is read: when `id` already sits in `dest`'s
   * child list, removal changes that pointer.
   */
  insertObject(id: number, dest: number): void {
    this.checkObject(dest);
    this.removeObject(id);
    const firstChild = this.getChild(dest);
    this.setSibling(id, firstChild);
    this.setChild(dest, id);
    this.setParent(id, dest);
  }

  // --- Attributes ---

  private attributeLocation(id: number, attribute: number): { addr: number; mask: number } {
    if (!Number.isInteger(attribute) || attribute < 0 || attribute > 31) {
      throw new InvalidAttributeError(attribute);
    }
    const addr = this.getObjectAddress(id) + ATTRIBUTES_OFFSET + (attribute >> 3);
    return { addr, mask: 0x80 >> (attribute & 7) };
  }

  getAttribute(id: number, attribute: number): boolean {
    const { addr, mask } = this.attributeLocation(id, attribute);
    return (this.memory.readByte(addr) & mask) !== 0;
  }

  setAttribute(id: number, attribute: number, value: boolean): void {
    const { addr, mask } = this.attributeLocation(id, attribute);
    const current = this.memory.readByte(addr);
    this.memory.writeByte(addr, value ? current | mask : current & ~mask);
  }

  // --- Properties ---

  getPropertyTableAddress(id: number): number {
    return this.memory.readWord(this.getObjectAddress(id) + PROPERTIES_OFFSET);
  }

  getShortName(id: number): string {
    const table = this.getPropertyTableAddress(id);
    if (this.memory.readByte(table) === 0) return "";
    return decodeZString(this.memory, table + 1, this.abbreviationsAddress).text;
  }

  getProperties(id: number): PropertyEntry[] {
    const table = this.getPropertyTableAddress(id);
    let addr = table + 1 + this.memory.readByte(table) * 2;
    const entries: PropertyEntry[] = [];
    for (;;) {
      const sizeByte = this.memory.readByte(addr);
      if (sizeByte === 0) break;
      const length = (sizeByte >> 5) + 1;
      entries.push({ number: sizeByte & 0x1f, length, dataAddress: addr + 1 });
      addr += 1 + length;
    }
    return entries;
  }

  private findProperty(id: number, property: number): PropertyEntry | undefined {
    if (!Number.isInteger(property) || property < 1 || property > PROPERTY_DEFAULTS_COUNT) {
      throw new InvalidPropertyError(`Invalid property number ${property}`);
    }
    return this.getProperties(id).find((p) => p.number === property);
  }

  // Data address of the property, or 0 when the object doesn't have it
  getPropertyAddress(id: number, property: number): number {
    return this.findProperty(id, property)?.dataAddress ?? 0;
  }

  // Length of the property whose data starts at dataAddress (0 for address 0)
  getPropertyLength(dataAddress: number): number {
    if (dataAddress === 0) return 0;
    return (this.memory.readByte(dataAddress - 1) >> 5) + 1;
  }

  getPropertyDefault(property: number): number {
    return this.memory.readWord(this.tableAddress + (property - 1) * 2);
  }

  getProperty(id: number, property: number): number {
    const entry = this.findProperty(id, property);
    if (!entry) return this.getPropertyDefault(property);
    if (entry.length === 1) return this.memory.readByte(entry.dataAddress);
    if (entry.length === 2) return this.memory.readWord(entry.dataAddress);
    throw new InvalidPropertyError(
      `get_prop on property ${property} of object ${id} with length ${entry.length}`,
    );
  }

  putProperty(id: number, property: number, value: number): void {
    const entry = this.findProperty(id, property);
    if (!entry) {
      throw new InvalidPropertyError(`Object ${id} has no property ${property}`);
    }
    if (entry.length === 1) {
      this.memory.writeByte(entry.dataAddress, value & 0xff);
    } else if (entry.length === 2) {
      this.memory.writeWord(entry.dataAddress, value);
    } else {
      throw new InvalidPropertyError(
        `put_prop on property ${property} of object ${id} with length ${entry.length}`,
      );
    }
  }

  // Property after `property` in the object's list; 0 asks for the first
  getNextProperty(id: number, property: number): number {
    const props = this.getProperties(id);
    if (property === 0) return props.length > 0 ? props[0].number : 0;
    const index = props.findIndex((p) => p.number === property);
    if (index < 0) {
      throw new InvalidPropertyError(`Object ${id} has no property ${property}`);
    }
    return index + 1 < props.length ? props[index + 1].number : 0;
  }
}
