export const overlapTemplate = `version: "0.1"
title: Overlap
canvas:
  width: 200
  height: 200
  background: white

# Children paint in order: the blue square covers part of the circle
drawing:
  type: combined
  children:
    - type: ellipse
      rect: [0, 0, 100, 100]
      fill: red
    - type: rectangle
      rect: [50, 50, 100, 100]
      fill: blue
`;
