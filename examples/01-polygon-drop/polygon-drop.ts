import { Application, Graphics } from 'pixi.js';
import {
	createFixedStepLoop,
	createInputState,
	createPhysicsSettings,
	createPolygonBody,
	createPolygonBodyGraphics,
	createSoftBodyController,
	createStaticPhysicsSpace,
	defineCollisionLayers,
	syncPolygonBodyGraphics,
	type SoftBody,
	type Vector2D,
} from '../../src';

const layers = defineCollisionLayers(['ground', 'walls']);

const pixi = new Application();
await pixi.init({ background: '#10161f', resizeTo: window });
document.body.appendChild(pixi.canvas);

const { width, height } = pixi.screen;

// Static level: a floor and a tilted ramp
const space = createStaticPhysicsSpace({
	colliders: [
		{
			points: [{ x: 0, y: 0 }, { x: width, y: 0 }, { x: width, y: 40 }, { x: 0, y: 40 }],
			transform: { x: 0, y: height - 40, rotation: 0 },
			layer: layers.ground,
		},
		{
			points: [{ x: -150, y: -10 }, { x: 150, y: -10 }, { x: 150, y: 10 }, { x: -150, y: 10 }],
			transform: { x: width / 2, y: height / 2, rotation: 0.3 },
			layer: layers.walls,
		},
	],
});

const level = new Graphics();
for (const collider of space.getColliders()) {
	level.poly(collider.points.flatMap((p) => [p.x, p.y]), true);
	level.fill(0x3a4a5c);
}
pixi.stage.addChild(level);

const settings = createPhysicsSettings();
const crate = createPolygonBody({
	points: [{ x: -24, y: -18 }, { x: 24, y: -24 }, { x: 30, y: 20 }, { x: -20, y: 24 }],
	transform: { x: width / 2 - 60, y: 60 },
	bounce: 0.45,
	friction: 0.15,
	collisionMask: layers.ground | layers.walls,
	settings,
	space,
});
const crateGraphics = await createPolygonBodyGraphics(crate);
pixi.stage.addChild(crateGraphics);

// A stand-in deformable body: one damped point mass
const blobState = { position: { x: 120, y: height / 2 }, velocity: { x: 0, y: 0 }, force: { x: 0, y: 0 } };
const blob: SoftBody = {
	applyForce(force: Vector2D) {
		blobState.force.x += force.x;
		blobState.force.y += force.y;
	},
};
const blobGraphics = new Graphics();
blobGraphics.circle(0, 0, 22);
blobGraphics.fill(0xe07a4f);
pixi.stage.addChild(blobGraphics);

const input = createInputState();
input.attach();
const controller = createSoftBodyController({ body: blob, actions: input.actions, power: 600 });

const loop = createFixedStepLoop({ fixedDt: 1 / 60 });
loop.addSystem('preUpdate', () => input.update(), 'input');
loop.addSystem('fixedUpdate', (dt) => { controller.step(dt); }, 'soft-body-controller');
loop.addSystem('fixedUpdate', (dt) => {
	blobState.velocity.x = (blobState.velocity.x + blobState.force.x) * 0.98;
	blobState.velocity.y = (blobState.velocity.y + blobState.force.y) * 0.98;
	blobState.position.x += blobState.velocity.x * dt;
	blobState.position.y += blobState.velocity.y * dt;
	blobState.force.x = 0;
	blobState.force.y = 0;
}, 'blob-integration');
loop.addSystem('fixedUpdate', (dt) => { crate.step(dt); }, 'crate');
loop.addSystem('render', () => {
	syncPolygonBodyGraphics(crateGraphics, crate);
	blobGraphics.position.set(blobState.position.x, blobState.position.y);
}, 'render');

pixi.ticker.add((ticker) => {
	loop.update(ticker.deltaMS / 1000);
});
