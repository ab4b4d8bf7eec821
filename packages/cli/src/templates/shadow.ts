export const shadowTemplate = `version: "0.1"
title: Shadowed gradient overlay
canvas:
  width: 200
  height: 200
  background: white

# Shadows need the layers backend
drawing:
  type: combined
  children:
    - type: shadow
      opacity: 0.75
      offset: [0, 3]
      radius: 3
      child:
        type: ellipse
        rect: [0, 0, 100, 100]
        fill: red
    - type: alpha
      factor: 0.7
      child:
        type: gradient
        rect: [50, 50, 100, 100]
        start: [0, 0]
        end: [1, 1]
        colors: [red, green, blue, cyan]
`;
