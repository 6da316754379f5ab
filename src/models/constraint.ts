// Constraint variants, keyed by the scalar kind they apply to

export interface IntMinConstraint {
  target: 'int';
  kind: 'min';
  bound: number;
}

export interface IntMaxConstraint {
  target: 'int';
  kind: 'max';
  bound: number;
}

export interface IntInConstraint {
  target: 'int';
  kind: 'in';
  members: number[];
}

export interface TextMinConstraint {
  target: 'string';
  kind: 'min';
  bound: number;
}

export interface TextMaxConstraint {
  target: 'string';
  kind: 'max';
  bound: number;
}

export interface TextLenConstraint {
  target: 'string';
  kind: 'len';
  length: number;
}

export interface TextInConstraint {
  target: 'string';
  kind: 'in';
  members: string[];
}

export type IntConstraint = IntMinConstraint | IntMaxConstraint | IntInConstraint;
export type TextConstraint = TextMinConstraint | TextMaxConstraint | TextLenConstraint | TextInConstraint;
export type Constraint = IntConstraint | TextConstraint;

export type IntConstraintKind = IntConstraint['kind'];
export type TextConstraintKind = TextConstraint['kind'];
