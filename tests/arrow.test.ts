import { expect } from "chai";

import { Arrow, Shape, shapeToDotString } from "../src/arrow";

describe("Arrow", () => {
  it("treats the empty arrow as the default", () => {
    const arrow = Arrow.default();
    expect(arrow.isDefault()).to.equal(true);
    expect(arrow.toDotString()).to.equal("");
  });

  it("renders the named constructors", () => {
    expect(Arrow.none().toDotString()).to.equal("none");
    expect(Arrow.normal().toDotString()).to.equal("normal");
    expect(Arrow.none().isDefault()).to.equal(false);
  });

  it("stacks shapes in order", () => {
    const arrow = new Arrow([Shape.normal("open", "left"), Shape.dot()]);
    expect(arrow.toDotString()).to.equal("olnormaldot");
  });

  it("refuses more than four shapes", () => {
    expect(() => new Arrow([Shape.tee(), Shape.tee(), Shape.tee(), Shape.tee(), Shape.tee()])).to.throw(
      "An arrow stacks at most 4 shapes, got 5"
    );
  });
});

describe("shapeToDotString", () => {
  it("prefixes fill before side", () => {
    expect(shapeToDotString(Shape.boxed("open", "right"))).to.equal("orbox");
    expect(shapeToDotString(Shape.diamond("filled", "left"))).to.equal("ldiamond");
    expect(shapeToDotString(Shape.icurve("open"))).to.equal("oicurve");
    expect(shapeToDotString(Shape.inv())).to.equal("inv");
  });

  it("only takes a side on side-only shapes", () => {
    expect(shapeToDotString(Shape.crow("left"))).to.equal("lcrow");
    expect(shapeToDotString(Shape.curve())).to.equal("curve");
    expect(shapeToDotString(Shape.tee("right"))).to.equal("rtee");
    expect(shapeToDotString(Shape.vee())).to.equal("vee");
  });

  it("only takes a fill on dots", () => {
    expect(shapeToDotString(Shape.dot())).to.equal("dot");
    expect(shapeToDotString(Shape.dot("open"))).to.equal("odot");
  });

  it("renders no arrow as none", () => {
    expect(shapeToDotString(Shape.none())).to.equal("none");
  });
});
