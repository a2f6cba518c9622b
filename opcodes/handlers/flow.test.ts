import { h_je, h_jg, h_jl, h_jump, h_jz } from "./flow";
import { IllegalOperationError } from "../../errors";
import {
  br,
  callTo,
  lg,
  machineWith,
  op0,
  op1,
  opv,
  printText,
  QUIT,
  sm,
} from "../test-utils";

// jz #value with the given branch, then "no" (3 bytes) and "yes"
const jzProgram = (value: number, branch: number[]) => [
  ...op1(0x00, sm(value)),
  ...branch,
  ...printText("no"),
  ...printText("yes"),
  ...QUIT,
];

// A routine whose body is `body`, called into G00 from the main code
function callingRoutine(body: number[], locals: number[] = []) {
  return machineWith((b) => [...callTo(b.addRoutine(locals, body)), ...QUIT]);
}

describe("Flow Control Handlers", () => {
  describe("conditional branches", () => {
    it("should skip ahead when the condition matches", async () => {
      const { vm, device } = machineWith(jzProgram(0, br(5)));
      await vm.run();
      expect(device.output).toBe("yes");
    });

    it("should fall through when it doesn't", async () => {
      const { vm, device } = machineWith(jzProgram(1, br(5)));
      await vm.run();
      expect(device.output).toBe("noyes");
    });

    it("should honour branch-on-false", async () => {
      const taken = machineWith(jzProgram(1, br(5, false)));
      await taken.vm.run();
      expect(taken.device.output).toBe("yes");

      const notTaken = machineWith(jzProgram(0, br(5, false)));
      await notTaken.vm.run();
      expect(notTaken.device.output).toBe("noyes");
    });

    it("should use the long form for far branches", async () => {
      // 100 bytes of nop between the branch and its target
      const { vm, device } = machineWith([
        ...op1(0x00, sm(0)),
        ...br(102),
        ...Array(100).fill(op0(0x04)[0]),
        ...printText("yes"),
        ...QUIT,
      ]);
      await vm.run();
      expect(device.output).toBe("yes");
    });

    it("should return false for offset 0", async () => {
      const { vm } = callingRoutine([...op1(0x00, sm(0)), ...br(0)]);
      vm.stack.writeVariable(0x10, 99);
      await vm.run();
      expect(vm.stack.readVariable(0x10)).toBe(0);
    });

    it("should return true for offset 1", async () => {
      const { vm } = callingRoutine([...op1(0x00, sm(0)), ...br(1)]);
      await vm.run();
      expect(vm.stack.readVariable(0x10)).toBe(1);
    });

    it("should return false for offset 0 on branch-on-false", async () => {
      const { vm } = callingRoutine([...op1(0x00, sm(1)), ...br(0, false)]);
      vm.stack.writeVariable(0x10, 99);
      await vm.run();
      expect(vm.stack.readVariable(0x10)).toBe(0);
    });

    it("should return true for offset 1 on branch-on-false", async () => {
      const { vm } = callingRoutine([...op1(0x00, sm(1)), ...br(1, false)]);
      await vm.run();
      expect(vm.stack.readVariable(0x10)).toBe(1);
    });
  });

  describe("comparisons", () => {
    const { vm } = machineWith(QUIT);

    it("h_jz should test for zero", () => {
      const branch = jest.fn();
      h_jz(vm, [0], { branch });
      h_jz(vm, [0x8000], { branch });
      expect(branch.mock.calls).toEqual([[true], [false]]);
    });

    it("h_je should match any later operand", () => {
      const branch = jest.fn();
      h_je(vm, [3, 1, 2, 3], { branch });
      h_je(vm, [3, 1, 2], { branch });
      h_je(vm, [0xffff, 0xffff], { branch });
      expect(branch.mock.calls).toEqual([[true], [false], [true]]);
    });

    it("h_jl and h_jg should compare signed", () => {
      const branch = jest.fn();
      h_jl(vm, [0xffff, 1], { branch });
      h_jg(vm, [0xffff, 1], { branch });
      h_jg(vm, [0x7fff, 0x8000], { branch });
      expect(branch.mock.calls).toEqual([[true], [false], [true]]);
    });
  });

  describe("h_jump", () => {
    it("should jump forward over code", async () => {
      const { vm, device } = machineWith([
        ...op1(0x0c, lg(5)),
        ...printText("no"),
        ...printText("yes"),
        ...QUIT,
      ]);
      await vm.run();
      expect(device.output).toBe("yes");
    });

    it("should take negative offsets", () => {
      const { vm } = machineWith(QUIT);
      vm.pc = 0x1010;
      h_jump(vm, [0xfffe]);
      expect(vm.pc).toBe(0x100c);
    });
  });

  describe("returns", () => {
    it("ret should store its operand in the caller's target", async () => {
      const { vm } = callingRoutine(op1(0x0b, lg(0x1234)));
      await vm.run();
      expect(vm.stack.readVariable(0x10)).toBe(0x1234);
    });

    it("rtrue and rfalse should return 1 and 0", async () => {
      const t = callingRoutine(op0(0x00));
      await t.vm.run();
      expect(t.vm.stack.readVariable(0x10)).toBe(1);

      const f = callingRoutine(op0(0x01));
      f.vm.stack.writeVariable(0x10, 99);
      await f.vm.run();
      expect(f.vm.stack.readVariable(0x10)).toBe(0);
    });

    it("ret_popped should return the top of the routine's stack", async () => {
      const { vm } = callingRoutine([...opv(0x08, [sm(7)]), ...op0(0x08)]);
      await vm.run();
      expect(vm.stack.readVariable(0x10)).toBe(7);
      expect(vm.stack.frameCount()).toBe(1);
    });

    it("should refuse to return from the main routine", async () => {
      const { vm, start } = machineWith(op0(0x00));
      const err = await vm.run().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IllegalOperationError);
      expect(err).toMatchObject({ pc: start });
      expect(vm.isHalted).toBe(true);
    });
  });

  describe("h_quit", () => {
    it("should halt the machine", async () => {
      const { vm } = machineWith(QUIT);
      await vm.run();
      expect(vm.isHalted).toBe(true);
    });
  });
});
