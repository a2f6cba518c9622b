import { ZObjectTable } from "./ZObjectTable";
import { ZMemory } from "./ZMemory";
import {
  InvalidAttributeError,
  InvalidObjectError,
  InvalidPropertyError,
} from "./errors";
import { ABBREVIATIONS, OBJECT_TABLE, STATIC_BASE, StoryBuilder } from "./opcodes/test-utils";

function setup() {
  const builder = new StoryBuilder()
    .setObjects([
      { name: "room", child: 2 },
      {
        name: "lamp",
        parent: 1,
        sibling: 3,
        attributes: [0, 9, 31],
        properties: [
          { number: 5, data: [0x12] },
          { number: 3, data: [0x01, 0x02] },
          { number: 2, data: [1, 2, 3] },
        ],
      },
      { name: "box", parent: 1 },
    ])
    .setPropertyDefault(7, 0x99);
  const memory = new ZMemory(builder.build(), STATIC_BASE);
  const objects = new ZObjectTable(memory, OBJECT_TABLE, ABBREVIATIONS);
  return { builder, memory, objects };
}

describe("ZObjectTable", () => {
  it("infers the object count from the first property table", () => {
    expect(setup().objects.count).toBe(3);
  });

  it("reads tree links", () => {
    const { objects } = setup();
    expect(objects.getParent(2)).toBe(1);
    expect(objects.getSibling(2)).toBe(3);
    expect(objects.getChild(1)).toBe(2);
    expect(objects.getChild(3)).toBe(0);
  });

  it("rejects object numbers outside the table", () => {
    const { objects } = setup();
    expect(() => objects.getParent(0)).toThrow(InvalidObjectError);
    expect(() => objects.getParent(4)).toThrow(InvalidObjectError);
  });

  describe("attributes", () => {
    it("numbers attributes from the high bit of the first byte", () => {
      const { objects, memory } = setup();
      expect(objects.getAttribute(2, 0)).toBe(true);
      expect(objects.getAttribute(2, 9)).toBe(true);
      expect(objects.getAttribute(2, 31)).toBe(true);
      expect(objects.getAttribute(2, 1)).toBe(false);
      expect(memory.readByte(objects.getObjectAddress(2) + 1)).toBe(0x40);
    });

    it("sets and clears single bits", () => {
      const { objects, memory } = setup();
      objects.setAttribute(3, 7, true);
      expect(memory.readByte(objects.getObjectAddress(3))).toBe(0x01);
      objects.setAttribute(2, 0, false);
      expect(objects.getAttribute(2, 0)).toBe(false);
      expect(objects.getAttribute(2, 9)).toBe(true);
    });

    it("rejects attributes above 31", () => {
      const { objects } = setup();
      expect(() => objects.getAttribute(2, 32)).toThrow(InvalidAttributeError);
      expect(() => objects.setAttribute(2, 32, true)).toThrow(InvalidAttributeError);
    });
  });

  describe("properties", () => {
    it("decodes the short name", () => {
      expect(setup().objects.getShortName(2)).toBe("lamp");
    });

    it("reads byte and word properties", () => {
      const { objects } = setup();
      expect(objects.getProperty(2, 5)).toBe(0x12);
      expect(objects.getProperty(2, 3)).toBe(0x0102);
    });

    it("falls back to the default table", () => {
      expect(setup().objects.getProperty(2, 7)).toBe(0x99);
    });

    it("refuses get_prop on a longer property", () => {
      expect(() => setup().objects.getProperty(2, 2)).toThrow(InvalidPropertyError);
    });

    it("finds property data addresses and lengths", () => {
      const { objects, builder } = setup();
      // name length byte, two name words, property 5 (2 bytes), then 3's size byte
      const table = builder.propertyTables[1];
      expect(objects.getPropertyAddress(2, 3)).toBe(table + 8);
      expect(objects.getPropertyLength(table + 8)).toBe(2);
      expect(objects.getPropertyLength(objects.getPropertyAddress(2, 2))).toBe(3);
      expect(objects.getPropertyAddress(2, 4)).toBe(0);
      expect(objects.getPropertyLength(0)).toBe(0);
    });

    it("walks property numbers in table order", () => {
      const { objects } = setup();
      expect(objects.getNextProperty(2, 0)).toBe(5);
      expect(objects.getNextProperty(2, 5)).toBe(3);
      expect(objects.getNextProperty(2, 2)).toBe(0);
      expect(objects.getNextProperty(1, 0)).toBe(0);
      expect(() => objects.getNextProperty(2, 4)).toThrow(InvalidPropertyError);
    });

    it("writes properties by their length", () => {
      const { objects } = setup();
      objects.putProperty(2, 5, 0x1ff);
      objects.putProperty(2, 3, 0xabcd);
      expect(objects.getProperty(2, 5)).toBe(0xff);
      expect(objects.getProperty(2, 3)).toBe(0xabcd);
      expect(() => objects.putProperty(2, 4, 1)).toThrow(InvalidPropertyError);
      expect(() => objects.putProperty(2, 2, 1)).toThrow(InvalidPropertyError);
    });
  });

  describe("tree mutation", () => {
    it("removes a first child", () => {
      const { objects } = setup();
      objects.removeObject(2);
      expect(objects.getChild(1)).toBe(3);
      expect(objects.getParent(2)).toBe(0);
      expect(objects.getSibling(2)).toBe(0);
    });

    it("removes a later child", () => {
      const { objects } = setup();
      objects.removeObject(3);
      expect(objects.getChild(1)).toBe(2);
      expect(objects.getSibling(2)).toBe(0);
      expect(objects.getParent(3)).toBe(0);
    });

    it("leaves an orphan alone", () => {
      const { objects } = setup();
      objects.removeObject(1);
      expect(objects.getParent(1)).toBe(0);
      expect(objects.getChild(1)).toBe(2);
    });

    it("inserts as the first child of another parent", () => {
      const { objects } = setup();
      objects.insertObject(2, 3);
      expect(objects.getChild(1)).toBe(3);
      expect(objects.getChild(3)).toBe(2);
      expect(objects.getParent(2)).toBe(3);
      expect(objects.getSibling(2)).toBe(0);
    });

    it("re-inserts the first child into its own parent without a self link", () => {
      const { objects } = setup();
      objects.insertObject(2, 1);
      expect(objects.getChild(1)).toBe(2);
      expect(objects.getSibling(2)).toBe(3);
      expect(objects.getSibling(3)).toBe(0);
    });

    it("moves a later child to the front", () => {
      const { objects } = setup();
      objects.insertObject(3, 1);
      expect(objects.getChild(1)).toBe(3);
      expect(objects.getSibling(3)).toBe(2);
      expect(objects.getSibling(2)).toBe(0);
    });

    it("moves a grandchild up to its grandparent", () => {
      const memory = new ZMemory(
        new StoryBuilder()
          .setObjects([
            { name: "room", child: 2 },
            { name: "table", parent: 1, sibling: 3, child: 4 },
            { name: "chair", parent: 1 },
            { name: "cup", parent: 2 },
          ])
          .build(),
        STATIC_BASE,
      );
      const objects = new ZObjectTable(memory, OBJECT_TABLE, ABBREVIATIONS);
      objects.insertObject(4, 1);
      expect(objects.getChild(1)).toBe(4);
      expect(objects.getParent(4)).toBe(1);
      expect(objects.getSibling(4)).toBe(2);
      expect(objects.getSibling(2)).toBe(3);
      expect(objects.getSibling(3)).toBe(0);
      expect(objects.getChild(2)).toBe(0);
    });

    it("checks the destination before unlinking", () => {
      const { objects } = setup();
      expect(() => objects.insertObject(2, 9)).toThrow(InvalidObjectError);
      expect(objects.getParent(2)).toBe(1);
    });
  });
});
