import type { Car } from "../types/car";
import type { Vec2 } from "../types/track";
import { ZERO_VEC, addVec } from "./vectorMath";

export function createCar(carId: string, startPos: Vec2): Car {
  return {
    carId,
    pos: startPos,
    velocity: ZERO_VEC,
    crashed: false,
    moveCount: 0,
    crossing: { hasIncorrectCrossing: false, consecutiveCorrect: 0 }
  };
}

export function accelerateCar(car: Car, acceleration: Vec2) {
  car.velocity = addVec(car.velocity, acceleration);
}

export function nextPosition(car: Car): Vec2 {
  return addVec(car.pos, car.velocity);
}

export function moveCar(car: Car) {
  car.pos = nextPosition(car);
  car.moveCount += 1;
}

export function crashCar(car: Car, crashPos: Vec2) {
  car.pos = crashPos;
  car.crashed = true;
}
