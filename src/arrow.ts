// Arrow shapes as listed in the Graphviz arrow-shape reference.

/** Whether the shape is drawn hollow (`o` prefix) or solid. */
export type Fill = "open" | "filled";

/** Which half of the shape is drawn (`l` / `r` prefix); `both` draws it whole. */
export type Side = "left" | "right" | "both";

export type ArrowShape =
  | { readonly shape: "none" }
  | { readonly shape: "normal" | "box" | "icurve" | "diamond" | "inv"; readonly fill: Fill; readonly side: Side }
  | { readonly shape: "crow" | "curve" | "tee" | "vee"; readonly side: Side }
  | { readonly shape: "dot"; readonly fill: Fill };

export const Shape = {
  none: (): ArrowShape => ({ shape: "none" }),
  normal: (fill: Fill = "filled", side: Side = "both"): ArrowShape => ({ shape: "normal", fill, side }),
  boxed: (fill: Fill = "filled", side: Side = "both"): ArrowShape => ({ shape: "box", fill, side }),
  crow: (side: Side = "both"): ArrowShape => ({ shape: "crow", side }),
  curve: (side: Side = "both"): ArrowShape => ({ shape: "curve", side }),
  icurve: (fill: Fill = "filled", side: Side = "both"): ArrowShape => ({ shape: "icurve", fill, side }),
  diamond: (fill: Fill = "filled", side: Side = "both"): ArrowShape => ({ shape: "diamond", fill, side }),
  dot: (fill: Fill = "filled"): ArrowShape => ({ shape: "dot", fill }),
  inv: (fill: Fill = "filled", side: Side = "both"): ArrowShape => ({ shape: "inv", fill, side }),
  tee: (side: Side = "both"): ArrowShape => ({ shape: "tee", side }),
  vee: (side: Side = "both"): ArrowShape => ({ shape: "vee", side }),
} as const;

function fillPrefix(fill: Fill): string {
  return fill === "open" ? "o" : "";
}

function sidePrefix(side: Side): string {
  if (side === "left") return "l";
  if (side === "right") return "r";
  return "";
}

export function shapeToDotString(arrow: ArrowShape): string {
  switch (arrow.shape) {
    case "none":
      return "none";
    case "dot":
      return `${fillPrefix(arrow.fill)}dot`;
    case "crow":
    case "curve":
    case "tee":
    case "vee":
      return `${sidePrefix(arrow.side)}${arrow.shape}`;
    default:
      return `${fillPrefix(arrow.fill)}${sidePrefix(arrow.side)}${arrow.shape}`;
  }
}

/**
 * The arrow at one end of an edge: up to four shapes, stacked from the node
 * outwards. An empty arrow leaves the end at Graphviz's default and writes no
 * attribute.
 */
export class Arrow {
  public constructor(public readonly arrows: readonly ArrowShape[] = []) {
    if (arrows.length > 4) {
      throw new Error(`An arrow stacks at most 4 shapes, got ${arrows.length}`);
    }
  }

  public static default(): Arrow {
    return new Arrow();
  }

  public static none(): Arrow {
    return new Arrow([Shape.none()]);
  }

  public static normal(): Arrow {
    return new Arrow([Shape.normal()]);
  }

  public static fromShape(shape: ArrowShape): Arrow {
    return new Arrow([shape]);
  }

  public isDefault(): boolean {
    return this.arrows.length === 0;
  }

  public toDotString(): string {
    return this.arrows.map(shapeToDotString).join("");
  }
}
