export const gradientTemplate = `version: "0.1"
title: Gradient overlay
canvas:
  width: 200
  height: 200
  background: white

drawing:
  type: combined
  children:
    - type: ellipse
      rect: [0, 0, 100, 100]
      fill: red
    - type: alpha
      factor: 0.7
      child:
        type: gradient
        rect: [50, 50, 100, 100]
        # start and end are relative to rect: (0,0) top-left, (1,1) bottom-right
        start: [0, 0]
        end: [1, 1]
        colors: [red, green, blue, cyan]
`;
